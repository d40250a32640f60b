import { PersistenceError, ReviewQueueError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { RecordStore } from '../record_store';
import type { PendingTask, ReviewTask } from '../task';
import { decodeTask } from './task_codec';
import { compareNewestFirst, emptyStatusCounts } from './task_store.types';
import type { ITaskStore, TaskListPage, TaskListQuery, TaskStatusCounts } from './task_store.types';

export type RecordTaskStoreDependencies = {
  records: RecordStore<ReviewTask>;
  logger?: Logger;
};

/**
 * ITaskStore over any RecordStore backend (memory, fs).
 *
 * Listing loads every record and sorts in process, so it suits
 * local and test deployments; large installations use PostgresTaskStore.
 */
export class RecordTaskStore implements ITaskStore {
  private readonly records: RecordStore<ReviewTask>;
  private readonly logger: Logger;

  constructor(deps: RecordTaskStoreDependencies) {
    this.records = deps.records;
    this.logger = deps.logger ?? createLogger('[RecordTaskStore] ');
  }

  async create(task: PendingTask): Promise<void> {
    await this.wrap(`create task ${task.id}`, async () => {
      if (await this.records.exists(task.id)) {
        throw new Error(`task ${task.id} already exists`);
      }
      await this.records.put(task.id, task);
    });
  }

  async get(id: string): Promise<ReviewTask | null> {
    return this.wrap(`read task ${id}`, async () => {
      const stored = await this.records.get(id);
      return stored === null ? null : decodeTask(stored);
    });
  }

  async save(task: ReviewTask): Promise<void> {
    await this.wrap(`save task ${task.id}`, () => this.records.put(task.id, task));
  }

  async delete(id: string): Promise<boolean> {
    return this.wrap(`delete task ${id}`, async () => {
      const existed = await this.records.exists(id);
      await this.records.delete(id);
      return existed;
    });
  }

  async list(query: TaskListQuery): Promise<TaskListPage> {
    const all = await this.loadAll();
    const matching = query.status ? all.filter((task) => task.status === query.status) : all;
    matching.sort(compareNewestFirst);

    const offset = (query.page - 1) * query.perPage;
    return {
      items: matching.slice(offset, offset + query.perPage),
      total: matching.length,
    };
  }

  async countByStatus(): Promise<TaskStatusCounts> {
    const counts = emptyStatusCounts();
    for (const task of await this.loadAll()) {
      counts[task.status] += 1;
    }
    return counts;
  }

  private async loadAll(): Promise<ReviewTask[]> {
    return this.wrap('list tasks', async () => {
      const ids = await this.records.list();
      const tasks: ReviewTask[] = [];
      for (const id of ids) {
        const stored = await this.records.get(id);
        // Deleted between list() and get()
        if (stored === null) continue;
        tasks.push(decodeTask(stored));
      }
      this.logger.debug(`Loaded ${tasks.length} task records`);
      return tasks;
    });
  }

  private async wrap<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ReviewQueueError) {
        throw error;
      }
      throw new PersistenceError(operation, error);
    }
  }
}
