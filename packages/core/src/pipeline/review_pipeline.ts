import { errorKindOf, toErrorMessage } from '../errors';
import { createTaskEvent } from '../event_bus';
import type { BaseEvent, IEventStream } from '../event_bus';
import { parseRepositoryUrl } from '../github';
import type { ChangedFile, ChangeFetcherFactory, ChangeMetadata } from '../github';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { IProgressChannel } from '../progress';
import { buildReviewInput } from '../review_input';
import type { IReviewGenerator, ReviewReport } from '../review_generator';
import { completeTask, failTask, isTerminal, startTask } from '../task';
import type { TaskMetadata, TaskResults } from '../task';
import type { ITaskStore } from '../task_store';
import type { ReviewJob } from '../job_queue';
import { PIPELINE_PHASES, PIPELINE_STEPS } from './pipeline.types';
import type {
  PipelineOutcome,
  PipelineRunOptions,
  ReviewPipelineDependencies,
} from './pipeline.types';

const SOURCE = 'review_pipeline';

/**
 * Sums additions and deletions over the changed files.
 */
export function deriveMetadata(metadata: ChangeMetadata, files: ChangedFile[]): TaskMetadata {
  return {
    prTitle: metadata.title,
    author: metadata.author,
    filesCount: files.length,
    additions: files.reduce((sum, file) => sum + file.additions, 0),
    deletions: files.reduce((sum, file) => sum + file.deletions, 0),
  };
}

/**
 * Executes one review job: initialize, fetch, analyze, persist.
 *
 * Safe to re-enter for the same task. A redelivered job re-runs the
 * stages against a PROCESSING record and never rewrites a terminal one.
 * Fatal errors go through `recordFailure`; a review generator failure
 * is stored on the completed record instead.
 *
 * @example
 * ```typescript
 * const outcome = await pipeline.execute({ taskId, repoUrl, prNumber: 42 });
 * if (outcome.status === 'failed' && !outcome.recorded) {
 *   // store unavailable, worth a redelivery
 * }
 * ```
 */
export class ReviewPipeline {
  private readonly store: ITaskStore;
  private readonly progress: IProgressChannel;
  private readonly fetcherFactory: ChangeFetcherFactory;
  private readonly reviewGenerator: IReviewGenerator;
  private readonly eventBus: IEventStream | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ReviewPipelineDependencies) {
    this.store = deps.store;
    this.progress = deps.progress;
    this.fetcherFactory = deps.fetcherFactory;
    this.reviewGenerator = deps.reviewGenerator;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? createLogger('[ReviewPipeline] ');
    this.now = deps.now ?? (() => new Date());
  }

  async execute(job: ReviewJob, options: PipelineRunOptions = {}): Promise<PipelineOutcome> {
    const { taskId } = job;
    const deliveryCount = options.deliveryCount ?? 1;
    const signal = options.signal;

    try {
      const record = await this.store.get(taskId);
      if (!record) {
        this.logger.warn(`Task ${taskId} no longer exists, skipping`);
        return { status: 'skipped', taskId, reason: 'not_found' };
      }
      if (isTerminal(record)) {
        this.logger.info(`Task ${taskId} is already ${record.status}, skipping delivery ${deliveryCount}`);
        return { status: 'skipped', taskId, reason: 'already_terminal' };
      }

      const processing = startTask(record, this.now());
      await this.store.save(processing);
      this.publish(createTaskEvent('review_task.started', { taskId, deliveryCount }, SOURCE));

      // Initialize
      this.reportStep(taskId, 1);
      const { owner, repo } = parseRepositoryUrl(job.repoUrl);
      const fetcher = this.fetcherFactory(job.credential);
      if (signal?.aborted) return this.abandon(taskId);

      // Fetch
      this.reportStep(taskId, 2);
      const metadata = await fetcher.getChangeMetadata(owner, repo, job.prNumber);
      const files = await fetcher.getChangedFiles(owner, repo, job.prNumber);
      if (signal?.aborted) return this.abandon(taskId);

      // Analyze
      this.reportStep(taskId, 3);
      const input = buildReviewInput(metadata, files);
      let review: ReviewReport | null = null;
      let reviewError: string | undefined;
      try {
        review = await this.reviewGenerator.review(input);
      } catch (error) {
        reviewError = toErrorMessage(error);
        this.logger.warn(`AI review failed for task ${taskId}: ${reviewError}`);
      }
      if (signal?.aborted) return this.abandon(taskId);

      // Persist
      this.reportStep(taskId, 4);
      const results: TaskResults = {
        prInfo: input.prInfo,
        codeChanges: input.codeChanges,
        review,
        ...(reviewError !== undefined ? { reviewError } : {}),
      };

      const current = await this.store.get(taskId);
      if (!current) {
        this.progress.clear(taskId);
        this.logger.warn(`Task ${taskId} was deleted during execution, discarding results`);
        return { status: 'skipped', taskId, reason: 'deleted' };
      }
      if (current.status !== 'processing' && current.status !== 'completed') {
        this.progress.clear(taskId);
        this.logger.warn(`Task ${taskId} moved to ${current.status} during execution, discarding results`);
        return { status: 'skipped', taskId, reason: 'already_terminal' };
      }

      const completed = completeTask(current, { results, metadata: deriveMetadata(metadata, files) }, this.now());
      await this.store.save(completed);
      this.progress.clear(taskId);

      this.publish(createTaskEvent(
        'review_task.completed',
        { taskId, filesCount: completed.filesCount, reviewed: review !== null },
        SOURCE,
      ));
      this.logger.info(`Task ${taskId} completed (${completed.filesCount} files)`);
      return { status: 'completed', taskId, reviewed: review !== null };
    } catch (error) {
      if (signal?.aborted) return this.abandon(taskId);
      return this.recordFailure(taskId, error);
    }
  }

  /**
   * Single failure path: reload the record, write FAILED, notify.
   * A store error here is logged and reported, never rethrown.
   */
  private async recordFailure(taskId: string, error: unknown): Promise<PipelineOutcome> {
    const errorMessage = toErrorMessage(error);
    const errorKind = errorKindOf(error);
    this.logger.error(`Task ${taskId} failed (${errorKind}): ${errorMessage}`);

    let recorded = false;
    try {
      const current = await this.store.get(taskId);
      if (!current) {
        this.progress.clear(taskId);
        return { status: 'skipped', taskId, reason: 'deleted' };
      }
      if (current.status === 'completed') {
        this.progress.clear(taskId);
        return { status: 'skipped', taskId, reason: 'already_terminal' };
      }
      await this.store.save(failTask(current, errorMessage, this.now()));
      recorded = true;
    } catch (persistError) {
      this.logger.error(`Could not record failure of task ${taskId}: ${toErrorMessage(persistError)}`);
    }

    this.progress.clear(taskId);
    this.publish(createTaskEvent('review_task.failed', { taskId, errorKind, errorMessage }, SOURCE));
    return { status: 'failed', taskId, errorKind, errorMessage, recorded };
  }

  private abandon(taskId: string): PipelineOutcome {
    this.progress.clear(taskId);
    this.logger.warn(`Task ${taskId} abandoned before completion`);
    return { status: 'skipped', taskId, reason: 'abandoned' };
  }

  private reportStep(taskId: string, step: number): void {
    const phase = PIPELINE_PHASES[step - 1] ?? '';
    this.progress.report(taskId, { current: step, total: PIPELINE_STEPS, phase });
  }

  private publish(event: BaseEvent): void {
    this.eventBus?.publish(event);
  }
}
