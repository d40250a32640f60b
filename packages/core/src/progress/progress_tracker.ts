import { createTaskEvent } from '../event_bus';
import type { IEventStream } from '../event_bus';
import type { TaskProgress } from '../task';

/**
 * Ephemeral per-task progress. Single writer (the executing worker),
 * any number of readers.
 */
export interface IProgressChannel {
  report(taskId: string, progress: TaskProgress): void;
  /** Latest progress, or null when none is live */
  read(taskId: string): TaskProgress | null;
  /** Drops the entry once the task is terminal */
  clear(taskId: string): void;
}

export type ProgressTrackerDependencies = {
  eventBus?: IEventStream;
};

/**
 * In-memory progress channel; mirrors every update on the event bus.
 */
export class ProgressTracker implements IProgressChannel {
  private readonly entries = new Map<string, TaskProgress>();
  private readonly eventBus: IEventStream | undefined;

  constructor(deps: ProgressTrackerDependencies = {}) {
    this.eventBus = deps.eventBus;
  }

  report(taskId: string, progress: TaskProgress): void {
    this.entries.set(taskId, { ...progress });
    this.eventBus?.publish(createTaskEvent('review_task.progress', { taskId, ...progress }, 'progress'));
  }

  read(taskId: string): TaskProgress | null {
    const entry = this.entries.get(taskId);
    return entry ? { ...entry } : null;
  }

  clear(taskId: string): void {
    this.entries.delete(taskId);
  }

  size(): number {
    return this.entries.size;
  }
}
