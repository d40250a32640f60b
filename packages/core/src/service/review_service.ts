import pg from 'pg';

import type { ServiceConfig } from '../config_manager';
import { JobDispatcher } from '../dispatcher';
import type { SubmitResult } from '../dispatcher';
import { GenerationError } from '../errors';
import { EventBus } from '../event_bus';
import { createGitHubFetcherFactory } from '../github';
import type { ChangeFetcherFactory } from '../github';
import { MemoryJobQueue } from '../job_queue';
import type { IJobQueue } from '../job_queue';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { ReviewPipeline } from '../pipeline';
import { ProgressTracker } from '../progress';
import { FsRecordStore, MemoryRecordStore } from '../record_store';
import { HttpReviewGenerator } from '../review_generator';
import type { IReviewGenerator, ReviewInput, ReviewReport } from '../review_generator';
import { TaskStatusReporter } from '../status_reporter';
import type { TaskListView, TaskResultsView, TaskStats, TaskStatusView } from '../status_reporter';
import type { ReviewTask, TaskStatus } from '../task';
import { PostgresTaskStore, RecordTaskStore } from '../task_store';
import type { ITaskStore, SqlClient } from '../task_store';

/**
 * Components replaced by the caller instead of built from config.
 */
export type ReviewServiceOverrides = {
  store?: ITaskStore;
  queue?: IJobQueue;
  fetcherFactory?: ChangeFetcherFactory;
  reviewGenerator?: IReviewGenerator;
  eventBus?: EventBus;
  logger?: Logger;
};

/**
 * Stands in when no review endpoint is configured.
 * Tasks still complete, with the reason stored as their review error.
 */
class UnconfiguredReviewGenerator implements IReviewGenerator {
  async review(_input: ReviewInput): Promise<ReviewReport> {
    throw new GenerationError('Review endpoint is not configured (set REVIEW_API_URL)');
  }
}

type StoreHandle = {
  store: ITaskStore;
  /** Runs once before the service takes work */
  prepare: () => Promise<void>;
  close: () => Promise<void>;
};

function createStore(config: ServiceConfig, logger: (prefix: string) => Logger): StoreHandle {
  const noop = async (): Promise<void> => undefined;
  switch (config.store.backend) {
    case 'memory':
      return {
        store: new RecordTaskStore({ records: new MemoryRecordStore<ReviewTask>(), logger: logger('[RecordTaskStore] ') }),
        prepare: noop,
        close: noop,
      };
    case 'fs':
      return {
        store: new RecordTaskStore({
          records: new FsRecordStore<ReviewTask>({ basePath: config.store.path }),
          logger: logger('[RecordTaskStore] '),
        }),
        prepare: noop,
        close: noop,
      };
    case 'postgres': {
      const pool = new pg.Pool({ connectionString: config.store.databaseUrl });
      const client: SqlClient = {
        query: async (text, values) => {
          const result = await pool.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
      };
      const store = new PostgresTaskStore({ client, logger: logger('[PostgresTaskStore] ') });
      return {
        store,
        prepare: () => store.ensureSchema(),
        close: () => pool.end(),
      };
    }
  }
}

/**
 * The review queue assembled from configuration: one store, one queue,
 * one worker pool, and the read side over them.
 *
 * @example
 * ```typescript
 * const service = createReviewService(loadServiceConfig());
 * await service.start();
 * const { taskId } = await service.submit('https://github.com/octo/widgets', 42);
 * ```
 */
export class ReviewService {
  readonly config: ServiceConfig;
  readonly eventBus: EventBus;
  readonly store: ITaskStore;
  readonly queue: IJobQueue;
  readonly progress: ProgressTracker;
  readonly pipeline: ReviewPipeline;
  readonly dispatcher: JobDispatcher;
  readonly reporter: TaskStatusReporter;

  private readonly logger: Logger;
  private readonly prepareStore: () => Promise<void>;
  private readonly closeStore: () => Promise<void>;
  private prepared: Promise<void> | null = null;

  constructor(config: ServiceConfig, overrides: ReviewServiceOverrides = {}) {
    const logger = (prefix: string): Logger => overrides.logger ?? createLogger(prefix, config.logLevel);

    this.config = config;
    this.logger = logger('[ReviewService] ');
    this.eventBus = overrides.eventBus ?? new EventBus({ logger: logger('[EventBus] ') });

    if (overrides.store) {
      this.store = overrides.store;
      this.prepareStore = async () => undefined;
      this.closeStore = async () => undefined;
    } else {
      const handle = createStore(config, logger);
      this.store = handle.store;
      this.prepareStore = handle.prepare;
      this.closeStore = handle.close;
    }

    this.queue = overrides.queue ?? new MemoryJobQueue();
    this.progress = new ProgressTracker({ eventBus: this.eventBus });

    const fetcherFactory = overrides.fetcherFactory ?? createGitHubFetcherFactory(
      {
        ...(config.github.apiBaseUrl ? { baseUrl: config.github.apiBaseUrl } : {}),
        ...(config.github.token ? { defaultToken: config.github.token } : {}),
      },
      logger('[GitHubChangeFetcher] '),
    );

    const { endpoint, apiKey, model } = config.review;
    const reviewGenerator = overrides.reviewGenerator ?? (endpoint
      ? new HttpReviewGenerator(
        { endpoint, ...(apiKey ? { apiKey } : {}), ...(model ? { model } : {}) },
        { logger: logger('[HttpReviewGenerator] ') },
      )
      : new UnconfiguredReviewGenerator());

    this.pipeline = new ReviewPipeline({
      store: this.store,
      progress: this.progress,
      fetcherFactory,
      reviewGenerator,
      eventBus: this.eventBus,
      logger: logger('[ReviewPipeline] '),
    });

    this.dispatcher = new JobDispatcher({
      store: this.store,
      queue: this.queue,
      executor: this.pipeline,
      settings: config.worker,
      eventBus: this.eventBus,
      logger: logger('[JobDispatcher] '),
    });

    this.reporter = new TaskStatusReporter({
      store: this.store,
      progress: this.progress,
      canceller: this.dispatcher,
      logger: logger('[TaskStatusReporter] '),
    });
  }

  /**
   * Prepares the store once. Read-only callers need nothing else.
   */
  async ready(): Promise<void> {
    if (!this.prepared) {
      this.prepared = this.prepareStore();
    }
    await this.prepared;
  }

  /**
   * Prepares the store and launches the worker pool.
   */
  async start(): Promise<void> {
    await this.ready();
    this.dispatcher.start();
    this.logger.debug(`Service started with the ${this.config.store.backend} store`);
  }

  /**
   * Stops the workers after their in-flight jobs and releases the store.
   */
  async close(): Promise<void> {
    await this.dispatcher.stop();
    await this.eventBus.waitForIdle();
    await this.closeStore();
  }

  async submit(repoUrl: string, prNumber: number, credential?: string): Promise<SubmitResult> {
    await this.ready();
    return this.dispatcher.submit(repoUrl, prNumber, credential);
  }

  async getStatus(taskId: string): Promise<TaskStatusView> {
    await this.ready();
    return this.reporter.getStatus(taskId);
  }

  async getResults(taskId: string): Promise<TaskResultsView> {
    await this.ready();
    return this.reporter.getResults(taskId);
  }

  async listTasks(page?: number, perPage?: number, status?: TaskStatus): Promise<TaskListView> {
    await this.ready();
    return this.reporter.listTasks(page, perPage, status);
  }

  async deleteTask(taskId: string): Promise<void> {
    await this.ready();
    await this.reporter.deleteTask(taskId);
  }

  async getStats(): Promise<TaskStats> {
    await this.ready();
    return this.reporter.getStats();
  }
}

export function createReviewService(config: ServiceConfig, overrides: ReviewServiceOverrides = {}): ReviewService {
  return new ReviewService(config, overrides);
}
