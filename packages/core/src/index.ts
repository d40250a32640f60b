export * as Config from "./config_manager";
export * as Dispatcher from "./dispatcher";
export * as Errors from "./errors";
export * as EventBus from "./event_bus";
export * as GitHub from "./github";
export * as JobQueue from "./job_queue";
export * as Logger from "./logger";
export * as Pipeline from "./pipeline";
export * as Progress from "./progress";
export * as RecordStore from "./record_store";
export * as ReviewGenerator from "./review_generator";
export * as ReviewInput from "./review_input";
export * as Schemas from "./schemas";
export * as Service from "./service";
export * as StatusReporter from "./status_reporter";
export * as Task from "./task";
export * as TaskStore from "./task_store";

// Entry points used by the CLI
export { loadServiceConfig } from "./config_manager";
export type { ServiceConfig, LoadServiceConfigOptions } from "./config_manager";
export { createReviewService, ReviewService } from "./service";
export type { ReviewServiceOverrides } from "./service";
export { ReviewQueueError, toErrorMessage } from "./errors";
export type { BaseEvent, ReviewTaskEvent } from "./event_bus";
export type { TaskStatus, TaskProgress } from "./task";
export type {
  TaskStatusView,
  TaskResultsView,
  TaskListView,
  TaskStats,
} from "./status_reporter";
