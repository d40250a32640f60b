import type { IEventStream } from '../event_bus';
import type { IJobQueue, ReviewJob } from '../job_queue';
import type { Logger } from '../logger';
import type { PipelineOutcome, PipelineRunOptions } from '../pipeline';
import type { ITaskStore } from '../task_store';

/**
 * Anything that can run one delivered job to an outcome.
 */
export interface IJobExecutor {
  execute(job: ReviewJob, options?: PipelineRunOptions): Promise<PipelineOutcome>;
}

export type SubmitRequest = {
  repoUrl: string;
  prNumber: number;
  credential?: string;
};

export type SubmitResult = {
  taskId: string;
  status: 'pending';
};

export type WorkerSettings = {
  /** Parallel worker loops (default: 2) */
  concurrency: number;
  /** Deliveries before an unrecorded failure is dropped (default: 3) */
  maxDeliveries: number;
  /** Wall-clock ceiling per job (default: 1800) */
  taskTimeLimitSeconds: number;
  /** Idle workers re-check the queue this often (default: 1000) */
  pollIntervalMs: number;
};

/** Node timers fire at once for delays above 2^31 - 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const MAX_TASK_TIME_LIMIT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

export const DEFAULT_WORKER_SETTINGS: WorkerSettings = {
  concurrency: 2,
  maxDeliveries: 3,
  taskTimeLimitSeconds: 1800,
  pollIntervalMs: 1000,
};

export type JobDispatcherDependencies = {
  store: ITaskStore;
  queue: IJobQueue;
  executor: IJobExecutor;
  settings?: Partial<WorkerSettings>;
  eventBus?: IEventStream;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
};
