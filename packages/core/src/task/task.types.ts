import type { CodeChange, PullRequestInfo, ReviewReport } from '../review_generator/review_generator.types';

export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'processing', 'completed', 'failed'];

export type TerminalStatus = 'completed' | 'failed';

/**
 * Stored outcome of a completed pipeline run.
 * `review` is null when the review generator failed; `reviewError` says why.
 */
export type TaskResults = {
  prInfo: PullRequestInfo;
  codeChanges: CodeChange[];
  review: ReviewReport | null;
  reviewError?: string;
};

/**
 * Metadata derived from the fetched pull request, set on completion.
 */
export type TaskMetadata = {
  prTitle: string;
  author: string | null;
  filesCount: number;
  additions: number;
  deletions: number;
};

type TaskBase = {
  id: string;
  repoUrl: string;
  prNumber: number;
  /** ISO-8601 */
  createdAt: string;
};

export type PendingTask = TaskBase & {
  status: 'pending';
};

export type ProcessingTask = TaskBase & {
  status: 'processing';
  startedAt: string;
};

export type CompletedTask = TaskBase &
  TaskMetadata & {
    status: 'completed';
    startedAt: string;
    completedAt: string;
    results: TaskResults;
  };

/**
 * `startedAt` is absent when the task failed before it was ever claimed.
 */
export type FailedTask = TaskBase & {
  status: 'failed';
  startedAt?: string;
  completedAt: string;
  errorMessage: string;
};

/**
 * Durable task record. Discriminated on `status`.
 */
export type ReviewTask = PendingTask | ProcessingTask | CompletedTask | FailedTask;

export type TerminalTask = CompletedTask | FailedTask;

/**
 * Ephemeral progress of a running task.
 */
export type TaskProgress = {
  current: number;
  total: number;
  /** Human-readable phase label */
  phase: string;
};
