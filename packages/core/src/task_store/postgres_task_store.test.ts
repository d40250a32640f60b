import { NotFoundError, PersistenceError } from '../errors';
import { ProgressTracker } from '../progress';
import { TaskStatusReporter } from '../status_reporter';
import { createPendingTask, failTask } from '../task';
import { PostgresTaskStore, REVIEW_TASKS_SCHEMA_SQL } from './postgres_task_store';
import type { SqlClient, SqlRow } from './postgres_task_store';

type QueryResultLike = { rows: SqlRow[]; rowCount: number | null };
type QueryMock = jest.Mock<Promise<QueryResultLike>, [string, unknown[]?]>;

function createFakeClient(): { client: SqlClient; query: QueryMock } {
  const query = jest.fn<Promise<QueryResultLike>, [string, unknown[]?]>();
  query.mockResolvedValue({ rows: [], rowCount: 0 });
  return { client: { query }, query };
}

const createdAt = new Date('2026-01-01T10:00:00.000Z');

describe('PostgresTaskStore', () => {
  it('should create the schema', async () => {
    const { client, query } = createFakeClient();
    const store = new PostgresTaskStore({ client });

    await store.ensureSchema();

    expect(query).toHaveBeenCalledWith(REVIEW_TASKS_SCHEMA_SQL);
    expect(REVIEW_TASKS_SCHEMA_SQL).toContain('results       JSONB');
  });

  it('should insert a pending task with null lifecycle columns', async () => {
    const { client, query } = createFakeClient();
    const store = new PostgresTaskStore({ client });

    await store.create(createPendingTask({ id: 'task-1', repoUrl: 'https://github.com/o/r', prNumber: 42 }, createdAt));

    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toMatch(/^INSERT INTO review_tasks \(id, repo_url, pr_number, status, /);
    expect(sql).not.toContain('ON CONFLICT');
    expect(params).toEqual([
      'task-1', 'https://github.com/o/r', 42, 'pending', '2026-01-01T10:00:00.000Z',
      null, null, null, null, null, null, null, null, null,
    ]);
  });

  it('should upsert on save', async () => {
    const { client, query } = createFakeClient();
    const store = new PostgresTaskStore({ client });
    const failed = failTask(
      createPendingTask({ id: 'task-1', repoUrl: 'u', prNumber: 1 }, createdAt),
      'boom',
      new Date('2026-01-01T10:01:00.000Z'),
    );

    await store.save(failed);

    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET repo_url = EXCLUDED.repo_url');
    expect(params?.slice(3, 8)).toEqual(['failed', '2026-01-01T10:00:00.000Z', null, '2026-01-01T10:01:00.000Z', 'boom']);
  });

  it('should map a completed row back to a task', async () => {
    const { client, query } = createFakeClient();
    query.mockResolvedValueOnce({
      rowCount: 1,
      rows: [{
        id: 'task-1',
        repo_url: 'https://github.com/o/r',
        pr_number: 42,
        status: 'completed',
        created_at: new Date('2026-01-01T10:00:00.000Z'),
        started_at: new Date('2026-01-01T10:00:01.000Z'),
        completed_at: new Date('2026-01-01T10:00:09.000Z'),
        error_message: null,
        results: { prInfo: { title: 'T', description: '' }, codeChanges: [], review: null, reviewError: 'down' },
        pr_title: 'T',
        author: 'octocat',
        files_count: 0,
        additions: 0,
        deletions: 0,
      }],
    });
    const store = new PostgresTaskStore({ client });

    const task = await store.get('task-1');

    expect(query).toHaveBeenCalledWith('SELECT * FROM review_tasks WHERE id = $1', ['task-1']);
    expect(task).toEqual({
      id: 'task-1',
      repoUrl: 'https://github.com/o/r',
      prNumber: 42,
      status: 'completed',
      createdAt: '2026-01-01T10:00:00.000Z',
      startedAt: '2026-01-01T10:00:01.000Z',
      completedAt: '2026-01-01T10:00:09.000Z',
      results: { prInfo: { title: 'T', description: '' }, codeChanges: [], review: null, reviewError: 'down' },
      prTitle: 'T',
      author: 'octocat',
      filesCount: 0,
      additions: 0,
      deletions: 0,
    });
  });

  it('should return null when no row matches', async () => {
    const { client } = createFakeClient();

    expect(await new PostgresTaskStore({ client }).get('missing')).toBeNull();
  });

  it('should key tasks by free-form text ids', async () => {
    expect(REVIEW_TASKS_SCHEMA_SQL).toContain('id            TEXT PRIMARY KEY');
  });

  it('should report an id that is not a UUID as not found', async () => {
    const { client, query } = createFakeClient();
    const reporter = new TaskStatusReporter({ store: new PostgresTaskStore({ client }), progress: new ProgressTracker() });

    await expect(reporter.getStatus('not-a-uuid')).rejects.toThrow(NotFoundError);
    await expect(reporter.deleteTask('not-a-uuid')).rejects.toThrow(NotFoundError);
    expect(query).toHaveBeenCalledWith('SELECT * FROM review_tasks WHERE id = $1', ['not-a-uuid']);
  });

  it('should page with LIMIT and OFFSET and parse the bigint total', async () => {
    const { client, query } = createFakeClient();
    query
      .mockResolvedValueOnce({ rows: [{ total: '12' }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });
    const store = new PostgresTaskStore({ client });

    const page = await store.list({ page: 2, perPage: 5, status: 'pending' });

    expect(page).toEqual({ items: [], total: 12 });
    expect(query.mock.calls[1]?.[1]).toEqual(['pending', 5, 5]);
  });

  it('should fill missing statuses with zero when counting', async () => {
    const { client, query } = createFakeClient();
    query.mockResolvedValueOnce({ rows: [{ status: 'completed', count: '2' }, { status: 'failed', count: '1' }], rowCount: 2 });

    expect(await new PostgresTaskStore({ client }).countByStatus()).toEqual({
      pending: 0,
      processing: 0,
      completed: 2,
      failed: 1,
    });
  });

  it('should report delete by affected rows', async () => {
    const { client, query } = createFakeClient();
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const store = new PostgresTaskStore({ client });

    expect(await store.delete('task-1')).toBe(true);
    expect(await store.delete('task-1')).toBe(false);
  });

  it('should wrap driver errors in PersistenceError', async () => {
    const { client, query } = createFakeClient();
    query.mockRejectedValueOnce(new Error('connection terminated'));

    await expect(new PostgresTaskStore({ client }).get('task-1')).rejects.toEqual(
      new PersistenceError('read task task-1', new Error('connection terminated')),
    );
  });
});
