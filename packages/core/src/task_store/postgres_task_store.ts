/**
 * PostgresTaskStore: ITaskStore on a `review_tasks` table.
 *
 * Takes any client with pg's `query(text, values)` shape (a pg.Pool in
 * production). Results are stored as JSONB; timestamps as TIMESTAMPTZ.
 */

import { PersistenceError, ReviewQueueError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { PendingTask, ReviewTask } from '../task';
import { decodeTask, MalformedTaskError } from './task_codec';
import { emptyStatusCounts } from './task_store.types';
import type { ITaskStore, TaskListPage, TaskListQuery, TaskStatusCounts } from './task_store.types';

export type SqlRow = Record<string, unknown>;

/**
 * Subset of pg.Pool / pg.Client used by the store.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: SqlRow[]; rowCount: number | null }>;
}

export const REVIEW_TASKS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS review_tasks (
  id            TEXT PRIMARY KEY,
  repo_url      TEXT NOT NULL,
  pr_number     INTEGER NOT NULL,
  status        TEXT NOT NULL CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
  created_at    TIMESTAMPTZ NOT NULL,
  started_at    TIMESTAMPTZ,
  completed_at  TIMESTAMPTZ,
  error_message TEXT,
  results       JSONB,
  pr_title      TEXT,
  author        TEXT,
  files_count   INTEGER,
  additions     INTEGER,
  deletions     INTEGER
);
CREATE INDEX IF NOT EXISTS review_tasks_status_idx ON review_tasks (status);
CREATE INDEX IF NOT EXISTS review_tasks_created_at_idx ON review_tasks (created_at DESC);
`;

const COLUMNS = [
  'id',
  'repo_url',
  'pr_number',
  'status',
  'created_at',
  'started_at',
  'completed_at',
  'error_message',
  'results',
  'pr_title',
  'author',
  'files_count',
  'additions',
  'deletions',
] as const;

const INSERT_SQL = `INSERT INTO review_tasks (${COLUMNS.join(', ')})
VALUES (${COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`;

const UPSERT_SQL = `${INSERT_SQL}
ON CONFLICT (id) DO UPDATE SET ${COLUMNS.filter((c) => c !== 'id').map((c) => `${c} = EXCLUDED.${c}`).join(', ')}`;

function toParams(task: ReviewTask): unknown[] {
  return [
    task.id,
    task.repoUrl,
    task.prNumber,
    task.status,
    task.createdAt,
    'startedAt' in task ? task.startedAt ?? null : null,
    'completedAt' in task ? task.completedAt : null,
    task.status === 'failed' ? task.errorMessage : null,
    task.status === 'completed' ? JSON.stringify(task.results) : null,
    task.status === 'completed' ? task.prTitle : null,
    task.status === 'completed' ? task.author : null,
    task.status === 'completed' ? task.filesCount : null,
    task.status === 'completed' ? task.additions : null,
    task.status === 'completed' ? task.deletions : null,
  ];
}

function toIso(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Maps a snake_case row to the stored record shape and decodes it.
 */
export function rowToTask(row: SqlRow): ReviewTask {
  return decodeTask({
    id: row['id'],
    repoUrl: row['repo_url'],
    prNumber: row['pr_number'],
    status: row['status'],
    createdAt: toIso(row['created_at']),
    startedAt: toIso(row['started_at']),
    completedAt: toIso(row['completed_at']),
    errorMessage: row['error_message'],
    results: typeof row['results'] === 'string' ? JSON.parse(row['results']) : row['results'],
    prTitle: row['pr_title'],
    author: row['author'],
    filesCount: row['files_count'],
    additions: row['additions'],
    deletions: row['deletions'],
  });
}

/** COUNT(*) comes back from pg as a bigint string. */
function toCount(value: unknown): number {
  const count = typeof value === 'string' ? Number(value) : value;
  if (typeof count !== 'number' || !Number.isInteger(count)) {
    throw new MalformedTaskError(`count "${String(value)}" is not an integer`);
  }
  return count;
}

export type PostgresTaskStoreDependencies = {
  client: SqlClient;
  logger?: Logger;
};

export class PostgresTaskStore implements ITaskStore {
  private readonly client: SqlClient;
  private readonly logger: Logger;

  constructor(deps: PostgresTaskStoreDependencies) {
    this.client = deps.client;
    this.logger = deps.logger ?? createLogger('[PostgresTaskStore] ');
  }

  /**
   * Creates the table and indexes when missing.
   */
  async ensureSchema(): Promise<void> {
    await this.wrap('create review_tasks schema', () => this.client.query(REVIEW_TASKS_SCHEMA_SQL));
    this.logger.debug('review_tasks schema ready');
  }

  async create(task: PendingTask): Promise<void> {
    await this.wrap(`create task ${task.id}`, () => this.client.query(INSERT_SQL, toParams(task)));
  }

  async get(id: string): Promise<ReviewTask | null> {
    return this.wrap(`read task ${id}`, async () => {
      const { rows } = await this.client.query('SELECT * FROM review_tasks WHERE id = $1', [id]);
      const [row] = rows;
      return row ? rowToTask(row) : null;
    });
  }

  async save(task: ReviewTask): Promise<void> {
    await this.wrap(`save task ${task.id}`, () => this.client.query(UPSERT_SQL, toParams(task)));
  }

  async delete(id: string): Promise<boolean> {
    return this.wrap(`delete task ${id}`, async () => {
      const { rowCount } = await this.client.query('DELETE FROM review_tasks WHERE id = $1', [id]);
      return (rowCount ?? 0) > 0;
    });
  }

  async list(query: TaskListQuery): Promise<TaskListPage> {
    return this.wrap('list tasks', async () => {
      const status = query.status ?? null;
      const { rows: countRows } = await this.client.query(
        'SELECT COUNT(*) AS total FROM review_tasks WHERE ($1::text IS NULL OR status = $1)',
        [status],
      );
      const { rows } = await this.client.query(
        `SELECT * FROM review_tasks WHERE ($1::text IS NULL OR status = $1)
ORDER BY created_at DESC, id ASC LIMIT $2 OFFSET $3`,
        [status, query.perPage, (query.page - 1) * query.perPage],
      );
      return {
        items: rows.map(rowToTask),
        total: toCount(countRows[0]?.['total'] ?? 0),
      };
    });
  }

  async countByStatus(): Promise<TaskStatusCounts> {
    return this.wrap('count tasks', async () => {
      const { rows } = await this.client.query(
        'SELECT status, COUNT(*) AS count FROM review_tasks GROUP BY status',
      );
      const counts = emptyStatusCounts();
      for (const row of rows) {
        const status = row['status'];
        if (status === 'pending' || status === 'processing' || status === 'completed' || status === 'failed') {
          counts[status] = toCount(row['count']);
        }
      }
      return counts;
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
