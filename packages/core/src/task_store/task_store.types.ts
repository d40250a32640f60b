import type { PendingTask, ReviewTask, TaskStatus } from '../task';

export type TaskListQuery = {
  /** 1-indexed */
  page: number;
  perPage: number;
  status?: TaskStatus;
};

export type TaskListPage = {
  /** Newest-created first */
  items: ReviewTask[];
  /** Matching records across all pages */
  total: number;
};

export type TaskStatusCounts = Record<TaskStatus, number>;

/**
 * Durable mapping from task id to its record.
 * Backend failures surface as PersistenceError.
 */
export interface ITaskStore {
  /** Inserts a new record; fails if the id already exists */
  create(task: PendingTask): Promise<void>;
  get(id: string): Promise<ReviewTask | null>;
  /** Replaces the record under `task.id` */
  save(task: ReviewTask): Promise<void>;
  /** @returns false when no record existed */
  delete(id: string): Promise<boolean>;
  list(query: TaskListQuery): Promise<TaskListPage>;
  countByStatus(): Promise<TaskStatusCounts>;
}

/**
 * Compares records newest-created first, ties broken by id.
 */
export function compareNewestFirst(a: ReviewTask, b: ReviewTask): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function emptyStatusCounts(): TaskStatusCounts {
  return { pending: 0, processing: 0, completed: 0, failed: 0 };
}
