export { TaskStatusReporter, toStatusView, isTaskStatus } from './task_status_reporter';
export type {
  ITaskCanceller,
  TaskListItem,
  TaskListView,
  TaskResultsView,
  TaskStats,
  TaskStatusReporterDependencies,
  TaskStatusView,
} from './status_reporter.types';
