import type { ErrorKind } from '../errors';
import type { IEventStream } from '../event_bus';
import type { ChangeFetcherFactory } from '../github';
import type { Logger } from '../logger';
import type { IProgressChannel } from '../progress';
import type { IReviewGenerator } from '../review_generator';
import type { ITaskStore } from '../task_store';

/**
 * Phase label published before each stage, in execution order.
 */
export const PIPELINE_PHASES = [
  'Initializing GitHub analyzer',
  'Fetching PR data',
  'Running AI code review',
  'Saving results',
] as const;

export const PIPELINE_STEPS = PIPELINE_PHASES.length;

export type SkipReason =
  /** No record for the id (deleted before the job started) */
  | 'not_found'
  /** Redelivery of a task that already reached completed or failed */
  | 'already_terminal'
  /** Record deleted while the stages ran; results discarded */
  | 'deleted'
  /** The caller gave up on the run (time limit) */
  | 'abandoned';

export type PipelineOutcome =
  | { status: 'completed'; taskId: string; reviewed: boolean }
  | {
      status: 'failed';
      taskId: string;
      errorKind: ErrorKind;
      errorMessage: string;
      /** False when the failure could not be written to the store */
      recorded: boolean;
    }
  | { status: 'skipped'; taskId: string; reason: SkipReason };

export type ReviewPipelineDependencies = {
  store: ITaskStore;
  progress: IProgressChannel;
  fetcherFactory: ChangeFetcherFactory;
  reviewGenerator: IReviewGenerator;
  eventBus?: IEventStream;
  logger?: Logger;
  /** Clock (default: current time) */
  now?: () => Date;
};

export type PipelineRunOptions = {
  /** 1 on first delivery */
  deliveryCount?: number;
  /** Checked between stages; once aborted nothing more is written */
  signal?: AbortSignal;
};
