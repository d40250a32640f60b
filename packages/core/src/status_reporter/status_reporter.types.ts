import type { Logger } from '../logger';
import type { IProgressChannel } from '../progress';
import type { ReviewReport } from '../review_generator';
import type { TaskProgress, TaskStatus } from '../task';
import type { ITaskStore, TaskStatusCounts } from '../task_store';

/**
 * Durable view of one task. Fields not reached yet are null.
 */
export type TaskStatusView = {
  taskId: string;
  status: TaskStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  repoUrl: string;
  prNumber: number;
  prTitle: string | null;
  author: string | null;
  filesCount: number | null;
  additions: number | null;
  deletions: number | null;
  errorMessage: string | null;
  /** Present only while the task is processing and progress is live */
  progress?: TaskProgress;
};

export type TaskResultsView = {
  taskId: string;
  status: 'completed';
  completedAt: string;
  results: {
    review: ReviewReport | null;
    reviewError?: string;
  };
};

export type TaskListItem = {
  taskId: string;
  status: TaskStatus;
  repoUrl: string;
  prNumber: number;
  createdAt: string;
  prTitle: string | null;
  author: string | null;
};

export type TaskListView = {
  tasks: TaskListItem[];
  total: number;
  page: number;
  perPage: number;
  pages: number;
};

export type TaskStats = TaskStatusCounts & {
  totalTasks: number;
  /** Percentage of completed tasks, two decimals */
  successRate: number;
};

/**
 * Pre-start cancellation, as offered by the dispatcher.
 */
export interface ITaskCanceller {
  cancel(taskId: string): Promise<boolean>;
}

export type TaskStatusReporterDependencies = {
  store: ITaskStore;
  progress: IProgressChannel;
  canceller?: ITaskCanceller;
  logger?: Logger;
};
