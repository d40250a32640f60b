export { RecordTaskStore } from './record_task_store';
export type { RecordTaskStoreDependencies } from './record_task_store';
export { PostgresTaskStore, REVIEW_TASKS_SCHEMA_SQL, rowToTask } from './postgres_task_store';
export type { PostgresTaskStoreDependencies, SqlClient, SqlRow } from './postgres_task_store';
export { decodeTask, MalformedTaskError } from './task_codec';
export { compareNewestFirst, emptyStatusCounts } from './task_store.types';
export type { ITaskStore, TaskListQuery, TaskListPage, TaskStatusCounts } from './task_store.types';
