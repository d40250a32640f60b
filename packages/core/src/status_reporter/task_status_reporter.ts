import { InvalidStateError, NotFoundError, ValidationError, toErrorMessage } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { IProgressChannel } from '../progress';
import { TASK_STATUSES } from '../task';
import type { ReviewTask, TaskProgress, TaskStatus } from '../task';
import type { ITaskStore } from '../task_store';
import type {
  ITaskCanceller,
  TaskListItem,
  TaskListView,
  TaskResultsView,
  TaskStats,
  TaskStatusReporterDependencies,
  TaskStatusView,
} from './status_reporter.types';

const MAX_PER_PAGE = 100;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((status) => status === value);
}

/**
 * Flattens a record into the status view. Progress is not included.
 */
export function toStatusView(task: ReviewTask): TaskStatusView {
  const view: TaskStatusView = {
    taskId: task.id,
    status: task.status,
    createdAt: task.createdAt,
    startedAt: null,
    completedAt: null,
    repoUrl: task.repoUrl,
    prNumber: task.prNumber,
    prTitle: null,
    author: null,
    filesCount: null,
    additions: null,
    deletions: null,
    errorMessage: null,
  };

  switch (task.status) {
    case 'pending':
      break;
    case 'processing':
      view.startedAt = task.startedAt;
      break;
    case 'completed':
      view.startedAt = task.startedAt;
      view.completedAt = task.completedAt;
      view.prTitle = task.prTitle;
      view.author = task.author;
      view.filesCount = task.filesCount;
      view.additions = task.additions;
      view.deletions = task.deletions;
      break;
    case 'failed':
      view.startedAt = task.startedAt ?? null;
      view.completedAt = task.completedAt;
      view.errorMessage = task.errorMessage;
      break;
  }
  return view;
}

function toListItem(task: ReviewTask): TaskListItem {
  return {
    taskId: task.id,
    status: task.status,
    repoUrl: task.repoUrl,
    prNumber: task.prNumber,
    createdAt: task.createdAt,
    prTitle: task.status === 'completed' ? task.prTitle : null,
    author: task.status === 'completed' ? task.author : null,
  };
}

/**
 * Read side of the queue: durable records plus the live progress overlay.
 */
export class TaskStatusReporter {
  private readonly store: ITaskStore;
  private readonly progress: IProgressChannel;
  private readonly canceller: ITaskCanceller | undefined;
  private readonly logger: Logger;

  constructor(deps: TaskStatusReporterDependencies) {
    this.store = deps.store;
    this.progress = deps.progress;
    this.canceller = deps.canceller;
    this.logger = deps.logger ?? createLogger('[TaskStatusReporter] ');
  }

  /**
   * @throws {NotFoundError} when no record exists
   */
  async getStatus(taskId: string): Promise<TaskStatusView> {
    const task = await this.requireTask(taskId);
    const view = toStatusView(task);
    if (task.status === 'processing') {
      const progress = this.readProgress(taskId);
      if (progress) {
        view.progress = progress;
      }
    }
    return view;
  }

  /**
   * @throws {NotFoundError} when no record exists
   * @throws {InvalidStateError} when the task is not completed
   */
  async getResults(taskId: string): Promise<TaskResultsView> {
    const task = await this.requireTask(taskId);
    if (task.status !== 'completed') {
      throw new InvalidStateError(taskId, task.status);
    }
    const { review, reviewError } = task.results;
    return {
      taskId,
      status: 'completed',
      completedAt: task.completedAt,
      results: reviewError !== undefined ? { review, reviewError } : { review },
    };
  }

  async listTasks(page = 1, perPage = 10, status?: TaskStatus): Promise<TaskListView> {
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be an integer >= 1', 'page');
    }
    if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
      throw new ValidationError(`perPage must be an integer between 1 and ${MAX_PER_PAGE}`, 'perPage');
    }

    const { items, total } = await this.store.list(status ? { page, perPage, status } : { page, perPage });
    return {
      tasks: items.map(toListItem),
      total,
      page,
      perPage,
      pages: Math.ceil(total / perPage),
    };
  }

  /**
   * Removes the record. A pending task has its queued job cancelled first.
   * @throws {NotFoundError} when no record exists
   */
  async deleteTask(taskId: string): Promise<void> {
    const task = await this.requireTask(taskId);
    if (task.status === 'pending' && this.canceller) {
      try {
        await this.canceller.cancel(taskId);
      } catch (error) {
        this.logger.warn(`Could not cancel queued job for task ${taskId}: ${toErrorMessage(error)}`);
      }
    }
    await this.store.delete(taskId);
    this.progress.clear(taskId);
    this.logger.info(`Task ${taskId} deleted`);
  }

  async getStats(): Promise<TaskStats> {
    const counts = await this.store.countByStatus();
    const totalTasks = counts.pending + counts.processing + counts.completed + counts.failed;
    return {
      ...counts,
      totalTasks,
      successRate: totalTasks === 0 ? 0 : round2((counts.completed / totalTasks) * 100),
    };
  }

  private async requireTask(taskId: string): Promise<ReviewTask> {
    const task = await this.store.get(taskId);
    if (!task) {
      throw new NotFoundError(taskId);
    }
    return task;
  }

  private readProgress(taskId: string): TaskProgress | null {
    try {
      return this.progress.read(taskId);
    } catch (error) {
      this.logger.debug(`Progress lookup for task ${taskId} failed: ${toErrorMessage(error)}`);
      return null;
    }
  }
}
