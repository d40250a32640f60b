import { randomUUID } from 'crypto';
import type { JSONSchemaType } from 'ajv';

import { DispatchError, ValidationError, toErrorMessage } from '../errors';
import { createTaskEvent } from '../event_bus';
import type { BaseEvent, IEventStream } from '../event_bus';
import type { IJobQueue, JobDelivery } from '../job_queue';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { PipelineOutcome } from '../pipeline';
import { compileSchema, formatSchemaErrors } from '../schemas';
import { createPendingTask } from '../task';
import type { ITaskStore } from '../task_store';
import { DEFAULT_WORKER_SETTINGS, MAX_TIMER_DELAY_MS } from './dispatcher.types';
import type {
  IJobExecutor,
  JobDispatcherDependencies,
  SubmitRequest,
  SubmitResult,
  WorkerSettings,
} from './dispatcher.types';

const SOURCE = 'job_dispatcher';

const submitRequestSchema: JSONSchemaType<SubmitRequest> = {
  type: 'object',
  properties: {
    repoUrl: { type: 'string', minLength: 1, pattern: '\\S' },
    prNumber: { type: 'integer', minimum: 1 },
    credential: { type: 'string', nullable: true },
  },
  required: ['repoUrl', 'prNumber'],
  additionalProperties: false,
};

const validateSubmitRequest = compileSchema(submitRequestSchema);

/**
 * Accepts review submissions and runs them on a pool of worker loops.
 *
 * Delivery is at-least-once: a job whose failure could not be written to
 * the store is requeued until it has been delivered `maxDeliveries` times.
 * Each job runs under a wall-clock ceiling; an overrunning job is abandoned
 * and its record is left PROCESSING.
 */
export class JobDispatcher {
  private readonly store: ITaskStore;
  private readonly queue: IJobQueue;
  private readonly executor: IJobExecutor;
  private readonly settings: WorkerSettings;
  private readonly eventBus: IEventStream | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly revoked = new Set<string>();
  private readonly active = new Set<string>();
  private readonly waiters = new Set<() => void>();
  private workers: Promise<void>[] = [];
  private unsubscribeAvailable: (() => void) | null = null;
  private running = false;
  private inFlight = 0;

  constructor(deps: JobDispatcherDependencies) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.executor = deps.executor;
    this.settings = { ...DEFAULT_WORKER_SETTINGS, ...deps.settings };
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? createLogger('[JobDispatcher] ');
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  /**
   * Writes a PENDING record and enqueues its job.
   * @throws {ValidationError} on an empty URL or a non-positive PR number
   * @throws {DispatchError} when the queue refuses the job; the record is removed again
   */
  async submit(repoUrl: string, prNumber: number, credential?: string): Promise<SubmitResult> {
    const request: SubmitRequest = credential === undefined
      ? { repoUrl, prNumber }
      : { repoUrl, prNumber, credential };
    if (!validateSubmitRequest(request)) {
      throw new ValidationError(
        `Invalid submission: ${formatSchemaErrors(validateSubmitRequest.errors)}`,
        validateSubmitRequest.errors?.[0]?.instancePath.slice(1) || undefined,
      );
    }

    const taskId = this.generateId();
    await this.store.create(createPendingTask({ id: taskId, repoUrl, prNumber }, this.now()));

    try {
      await this.queue.enqueue({ ...request, taskId });
    } catch (error) {
      const reason = toErrorMessage(error);
      this.logger.error(`Could not enqueue task ${taskId}: ${reason}`);
      await this.discardRecord(taskId);
      throw new DispatchError(taskId, reason);
    }

    this.publish(createTaskEvent('review_task.submitted', { taskId, repoUrl, prNumber }, SOURCE));
    this.logger.info(`Task ${taskId} queued for ${repoUrl}#${prNumber}`);
    return { taskId, status: 'pending' };
  }

  /**
   * Best-effort cancellation of a job that has not started.
   * A job neither queued nor running is remembered as revoked and dropped
   * on delivery. A running job is left alone.
   * @returns true when the queued job was removed
   */
  async cancel(taskId: string): Promise<boolean> {
    const removed = await this.queue.remove(taskId);
    if (!removed && !this.active.has(taskId)) {
      this.revoked.add(taskId);
    }
    this.publish(createTaskEvent('review_task.cancelled', { taskId, removed }, SOURCE));
    this.logger.debug(`Cancel requested for task ${taskId} (removed from queue: ${removed})`);
    return removed;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.unsubscribeAvailable = this.queue.onAvailable(() => this.wakeAll());
    for (let index = 0; index < this.settings.concurrency; index++) {
      this.workers.push(this.runWorker(index));
    }
    this.logger.info(`Started ${this.settings.concurrency} worker(s)`);
  }

  /**
   * Stops taking new jobs and waits for the in-flight ones.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.unsubscribeAvailable?.();
    this.unsubscribeAvailable = null;
    this.wakeAll();
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('Workers stopped');
  }

  /**
   * Resolves once the queue is empty and no job is in flight,
   * or as soon as the workers are stopped.
   */
  async drain(): Promise<void> {
    while (this.running && (this.inFlight > 0 || (await this.queue.size()) > 0)) {
      await this.sleep(Math.min(this.settings.pollIntervalMs, 50));
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Workers currently claiming or running a job */
  inFlightCount(): number {
    return this.inFlight;
  }

  /** Cancelled ids still waiting for their delivery to be dropped */
  revokedCount(): number {
    return this.revoked.size;
  }

  private async runWorker(index: number): Promise<void> {
    this.logger.debug(`Worker ${index} started`);
    while (this.running) {
      let handled = false;
      this.inFlight++;
      try {
        const delivery = await this.queue.dequeue();
        if (delivery) {
          await this.handle(delivery);
          handled = true;
        }
      } catch (error) {
        this.logger.error(`Worker ${index} could not read the queue: ${toErrorMessage(error)}`);
      } finally {
        this.inFlight--;
      }
      if (!handled) {
        await this.waitForWork();
      }
    }
    this.logger.debug(`Worker ${index} stopped`);
  }

  private async handle(delivery: JobDelivery): Promise<void> {
    const { job, deliveryCount } = delivery;
    try {
      if (this.revoked.delete(job.taskId)) {
        this.logger.info(`Dropping revoked task ${job.taskId}`);
        await this.queue.ack(delivery);
        return;
      }

      this.active.add(job.taskId);
      let outcome: PipelineOutcome | null;
      try {
        outcome = await this.runWithTimeLimit(delivery);
      } finally {
        this.active.delete(job.taskId);
      }
      if (outcome === null) {
        await this.reportTimeout(job.taskId);
        await this.queue.ack(delivery);
        return;
      }

      if (this.shouldRedeliver(outcome, deliveryCount)) {
        this.logger.warn(`Requeueing task ${job.taskId} after delivery ${deliveryCount}`);
        await this.queue.nack(delivery, true);
        return;
      }
      await this.queue.ack(delivery);
    } catch (error) {
      this.logger.error(`Worker error on task ${job.taskId}: ${toErrorMessage(error)}`);
      await this.settle(delivery, deliveryCount < this.settings.maxDeliveries);
    }
  }

  private shouldRedeliver(outcome: PipelineOutcome, deliveryCount: number): boolean {
    return outcome.status === 'failed'
      && !outcome.recorded
      && deliveryCount < this.settings.maxDeliveries;
  }

  /**
   * Runs the job under the wall-clock ceiling.
   * The ceiling is capped at the longest delay a Node timer honours.
   * @returns null when the ceiling was hit
   */
  private async runWithTimeLimit(delivery: JobDelivery): Promise<PipelineOutcome | null> {
    const controller = new AbortController();
    const limitMs = Math.min(this.settings.taskTimeLimitSeconds * 1000, MAX_TIMER_DELAY_MS);
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<null>((resolve) => {
      timer = setTimeout(() => {
        // Mark and settle before aborting: an executor may settle synchronously on abort
        timedOut = true;
        resolve(null);
        controller.abort();
      }, limitMs);
    });

    try {
      const outcome = await Promise.race([
        this.executor.execute(delivery.job, {
          deliveryCount: delivery.deliveryCount,
          signal: controller.signal,
        }),
        expired,
      ]);
      return timedOut ? null : outcome;
    } finally {
      clearTimeout(timer);
    }
  }

  private async reportTimeout(taskId: string): Promise<void> {
    const timeLimitSeconds = this.settings.taskTimeLimitSeconds;
    this.logger.error(`Task ${taskId} exceeded the ${timeLimitSeconds}s time limit and was abandoned`);
    try {
      const record = await this.store.get(taskId);
      if (record) {
        this.publish(createTaskEvent(
          'review_task.timed_out',
          { taskId, timeLimitSeconds, status: record.status },
          SOURCE,
        ));
      }
    } catch (error) {
      this.logger.error(`Could not read task ${taskId} after timeout: ${toErrorMessage(error)}`);
    }
  }

  private async settle(delivery: JobDelivery, requeue: boolean): Promise<void> {
    try {
      if (requeue) {
        await this.queue.nack(delivery, true);
      } else {
        await this.queue.ack(delivery);
      }
    } catch (error) {
      this.logger.error(`Could not settle delivery ${delivery.deliveryTag}: ${toErrorMessage(error)}`);
    }
  }

  private async discardRecord(taskId: string): Promise<void> {
    try {
      await this.store.delete(taskId);
    } catch (error) {
      this.logger.error(`Could not remove record of unqueued task ${taskId}: ${toErrorMessage(error)}`);
    }
  }

  private waitForWork(): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = (): void => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      this.waiters.add(done);
      timer = setTimeout(done, this.settings.pollIntervalMs);
    });
  }

  private wakeAll(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private publish(event: BaseEvent): void {
    this.eventBus?.publish(event);
  }
}
