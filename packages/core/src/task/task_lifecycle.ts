import { InvalidStateError } from '../errors';
import type {
  CompletedTask,
  FailedTask,
  PendingTask,
  ProcessingTask,
  ReviewTask,
  TaskMetadata,
  TaskResults,
  TaskStatus,
  TerminalTask,
} from './task.types';

/**
 * Edges of the task state machine.
 * Same-state edges on processing/completed/failed are redelivery re-entries.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['processing', 'failed'],
  processing: ['processing', 'completed', 'failed'],
  completed: ['completed'],
  failed: ['failed'],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(task: ReviewTask, to: TaskStatus): void {
  if (!canTransition(task.status, to)) {
    throw new InvalidStateError(
      task.id,
      task.status,
      `Invalid transition for task ${task.id}: ${task.status} -> ${to}`,
    );
  }
}

export function isTerminal(task: ReviewTask): task is TerminalTask {
  return task.status === 'completed' || task.status === 'failed';
}

export function createPendingTask(
  input: { id: string; repoUrl: string; prNumber: number },
  now: Date,
): PendingTask {
  return {
    id: input.id,
    repoUrl: input.repoUrl,
    prNumber: input.prNumber,
    status: 'pending',
    createdAt: now.toISOString(),
  };
}

/**
 * PENDING -> PROCESSING. Re-entering an already processing task keeps its startedAt.
 */
export function startTask(task: PendingTask | ProcessingTask, now: Date): ProcessingTask {
  assertTransition(task, 'processing');
  return {
    id: task.id,
    repoUrl: task.repoUrl,
    prNumber: task.prNumber,
    createdAt: task.createdAt,
    status: 'processing',
    startedAt: task.status === 'processing' ? task.startedAt : now.toISOString(),
  };
}

/**
 * PROCESSING -> COMPLETED. Rewriting a completed task keeps its first completedAt.
 */
export function completeTask(
  task: ProcessingTask | CompletedTask,
  completion: { results: TaskResults; metadata: TaskMetadata },
  now: Date,
): CompletedTask {
  assertTransition(task, 'completed');
  const { metadata } = completion;
  return {
    id: task.id,
    repoUrl: task.repoUrl,
    prNumber: task.prNumber,
    createdAt: task.createdAt,
    status: 'completed',
    startedAt: task.startedAt,
    completedAt: task.status === 'completed' ? task.completedAt : now.toISOString(),
    results: completion.results,
    prTitle: metadata.prTitle,
    author: metadata.author,
    filesCount: metadata.filesCount,
    additions: metadata.additions,
    deletions: metadata.deletions,
  };
}

/**
 * PENDING | PROCESSING -> FAILED. Rewriting a failed task keeps its first completedAt.
 */
export function failTask(
  task: PendingTask | ProcessingTask | FailedTask,
  errorMessage: string,
  now: Date,
): FailedTask {
  assertTransition(task, 'failed');
  const failed: FailedTask = {
    id: task.id,
    repoUrl: task.repoUrl,
    prNumber: task.prNumber,
    createdAt: task.createdAt,
    status: 'failed',
    completedAt: task.status === 'failed' ? task.completedAt : now.toISOString(),
    errorMessage,
  };
  if (task.status !== 'pending' && task.startedAt !== undefined) {
    failed.startedAt = task.startedAt;
  }
  return failed;
}
