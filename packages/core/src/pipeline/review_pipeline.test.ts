import { GenerationError, PersistenceError, TransportError } from '../errors';
import { EventBus } from '../event_bus';
import type { BaseEvent } from '../event_bus';
import type { ChangedFile, IChangeFetcher } from '../github';
import { ProgressTracker } from '../progress';
import { MemoryRecordStore } from '../record_store';
import type { IReviewGenerator, ReviewReport } from '../review_generator';
import { createPendingTask, failTask, startTask } from '../task';
import type { ReviewTask, TaskProgress } from '../task';
import { RecordTaskStore } from '../task_store';
import { ReviewPipeline } from './review_pipeline';
import type { ReviewPipelineDependencies } from './pipeline.types';

const REPO_URL = 'https://github.com/octo/widgets';

const FILES: ChangedFile[] = [
  { filename: 'src/app.py', additions: 10, deletions: 2, patch: '@@ -1,2 +1,10 @@' },
  { filename: 'Dockerfile', additions: 1, deletions: 1, patch: '@@ -1 +1 @@' },
  { filename: 'docs/logo.png', additions: 0, deletions: 0 },
];

const REPORT: ReviewReport = {
  files: [{ name: 'src/app.py', issues: [{ type: 'bug', line: 4, description: 'Off by one', suggestion: 'Use <=' }] }],
  summary: { totalFiles: 1, totalIssues: 1, criticalIssues: 1 },
};

type Harness = {
  pipeline: ReviewPipeline;
  store: RecordTaskStore;
  progress: ProgressTracker;
  fetcher: { getChangeMetadata: jest.Mock; getChangedFiles: jest.Mock };
  fetcherFactory: jest.Mock;
  reviewGenerator: { review: jest.Mock };
  events: BaseEvent[];
  phases: TaskProgress[];
};

function createHarness(overrides: Partial<ReviewPipelineDependencies> = {}): Harness {
  let tick = 0;
  const store = new RecordTaskStore({ records: new MemoryRecordStore<ReviewTask>() });
  const progress = new ProgressTracker();
  const phases: TaskProgress[] = [];
  const report = progress.report.bind(progress);
  jest.spyOn(progress, 'report').mockImplementation((taskId, value) => {
    phases.push(value);
    report(taskId, value);
  });

  const fetcher = {
    getChangeMetadata: jest.fn().mockResolvedValue({ title: 'Add app', description: null, author: 'octocat' }),
    getChangedFiles: jest.fn().mockResolvedValue(FILES),
  };
  const fetcherFactory = jest.fn((): IChangeFetcher => fetcher);
  const reviewGenerator = { review: jest.fn().mockResolvedValue(REPORT) };
  const reviewer: IReviewGenerator = reviewGenerator;

  const eventBus = new EventBus();
  const events: BaseEvent[] = [];
  eventBus.subscribeToAll((event) => {
    events.push(event);
  });

  const pipeline = new ReviewPipeline({
    store,
    progress,
    fetcherFactory,
    reviewGenerator: reviewer,
    eventBus,
    now: () => new Date(Date.UTC(2026, 0, 1, 10, 0, ++tick)),
    ...overrides,
  });

  return { pipeline, store, progress, fetcher, fetcherFactory, reviewGenerator, events, phases };
}

async function seedPending(store: RecordTaskStore, repoUrl = REPO_URL): Promise<void> {
  await store.create(createPendingTask({ id: 'task-1', repoUrl, prNumber: 42 }, new Date(Date.UTC(2026, 0, 1, 10))));
}

describe('ReviewPipeline', () => {
  it('should complete a task with three files and a successful review', async () => {
    const h = createHarness();
    await seedPending(h.store);

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42, credential: 'test-token' });

    expect(outcome).toEqual({ status: 'completed', taskId: 'task-1', reviewed: true });
    const task = await h.store.get('task-1');
    expect(task).toMatchObject({
      status: 'completed',
      prTitle: 'Add app',
      author: 'octocat',
      filesCount: 3,
      additions: 11,
      deletions: 3,
    });
    if (task?.status !== 'completed') throw new Error('expected a completed task');
    expect(task.results).toEqual({
      prInfo: { title: 'Add app', description: '' },
      codeChanges: [
        { filename: 'src/app.py', language: 'py', diff: '@@ -1,2 +1,10 @@' },
        { filename: 'Dockerfile', language: 'unknown', diff: '@@ -1 +1 @@' },
        { filename: 'docs/logo.png', language: 'png', diff: '' },
      ],
      review: REPORT,
    });
    expect(h.fetcherFactory).toHaveBeenCalledWith('test-token');
    expect(h.fetcher.getChangedFiles).toHaveBeenCalledWith('octo', 'widgets', 42);
  });

  it('should report the four phases in order and clear progress at the end', async () => {
    const h = createHarness();
    await seedPending(h.store);

    await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(h.phases).toEqual([
      { current: 1, total: 4, phase: 'Initializing GitHub analyzer' },
      { current: 2, total: 4, phase: 'Fetching PR data' },
      { current: 3, total: 4, phase: 'Running AI code review' },
      { current: 4, total: 4, phase: 'Saving results' },
    ]);
    expect(h.progress.read('task-1')).toBeNull();
  });

  it('should order createdAt <= startedAt <= completedAt', async () => {
    const h = createHarness();
    await seedPending(h.store);

    await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    const task = await h.store.get('task-1');
    if (task?.status !== 'completed') throw new Error('expected a completed task');
    expect(task.createdAt).toBe('2026-01-01T10:00:00.000Z');
    expect(task.startedAt).toBe('2026-01-01T10:00:01.000Z');
    expect(task.completedAt).toBe('2026-01-01T10:00:02.000Z');
  });

  it('should complete with a null review when the generator fails', async () => {
    const h = createHarness();
    h.reviewGenerator.review.mockRejectedValueOnce(new GenerationError('Review API error: 500 Internal Server Error'));
    await seedPending(h.store);

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(outcome).toEqual({ status: 'completed', taskId: 'task-1', reviewed: false });
    const task = await h.store.get('task-1');
    if (task?.status !== 'completed') throw new Error('expected a completed task');
    expect(task.results.review).toBeNull();
    expect(task.results.reviewError).toBe('Review API error: 500 Internal Server Error');
    expect(task.filesCount).toBe(3);
  });

  it('should fail the task when the fetcher throws', async () => {
    const h = createHarness();
    h.fetcher.getChangeMetadata.mockRejectedValueOnce(new TransportError('Not found: pull request octo/widgets#42'));
    await seedPending(h.store);

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(outcome).toEqual({
      status: 'failed',
      taskId: 'task-1',
      errorKind: 'transport',
      errorMessage: 'Not found: pull request octo/widgets#42',
      recorded: true,
    });
    const task = await h.store.get('task-1');
    expect(task).toMatchObject({ status: 'failed', errorMessage: 'Not found: pull request octo/widgets#42' });
    expect(task).not.toHaveProperty('results');
    expect(h.reviewGenerator.review).not.toHaveBeenCalled();
    expect(h.progress.read('task-1')).toBeNull();
  });

  it('should fail the task on a repository URL without owner and repo', async () => {
    const h = createHarness();
    await seedPending(h.store, 'https://github.com/octo');

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: 'https://github.com/octo', prNumber: 42 });

    expect(outcome).toMatchObject({ status: 'failed', errorKind: 'validation', errorMessage: 'Invalid GitHub repository URL' });
    expect(h.fetcherFactory).not.toHaveBeenCalled();
  });

  it('should publish started, progress and completed events', async () => {
    const h = createHarness();
    await seedPending(h.store);

    await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 }, { deliveryCount: 2 });

    expect(h.events.map((e) => e.type)).toEqual(['review_task.started', 'review_task.completed']);
    expect(h.events[0]?.payload).toEqual({ taskId: 'task-1', deliveryCount: 2 });
    expect(h.events[1]?.payload).toEqual({ taskId: 'task-1', filesCount: 3, reviewed: true });
  });

  it('should skip a task whose record does not exist', async () => {
    const h = createHarness();

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(outcome).toEqual({ status: 'skipped', taskId: 'task-1', reason: 'not_found' });
    expect(h.fetcherFactory).not.toHaveBeenCalled();
  });

  it('should skip a redelivery of a terminal task without rewriting it', async () => {
    const h = createHarness();
    const failed = failTask(
      createPendingTask({ id: 'task-1', repoUrl: REPO_URL, prNumber: 42 }, new Date(Date.UTC(2026, 0, 1, 9))),
      'earlier failure',
      new Date(Date.UTC(2026, 0, 1, 9, 5)),
    );
    await h.store.save(failed);

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 }, { deliveryCount: 2 });

    expect(outcome).toEqual({ status: 'skipped', taskId: 'task-1', reason: 'already_terminal' });
    expect(await h.store.get('task-1')).toEqual(failed);
  });

  it('should keep the first startedAt when a processing task is redelivered', async () => {
    const h = createHarness();
    const processing = startTask(
      createPendingTask({ id: 'task-1', repoUrl: REPO_URL, prNumber: 42 }, new Date(Date.UTC(2026, 0, 1, 9))),
      new Date(Date.UTC(2026, 0, 1, 9, 1)),
    );
    await h.store.save(processing);

    await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 }, { deliveryCount: 2 });

    expect(await h.store.get('task-1')).toMatchObject({
      status: 'completed',
      startedAt: '2026-01-01T09:01:00.000Z',
    });
  });

  it('should discard results when the record is deleted during execution', async () => {
    const h = createHarness();
    await seedPending(h.store);
    h.fetcher.getChangedFiles.mockImplementationOnce(async () => {
      await h.store.delete('task-1');
      return FILES;
    });

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(outcome).toEqual({ status: 'skipped', taskId: 'task-1', reason: 'deleted' });
    expect(await h.store.get('task-1')).toBeNull();
  });

  it('should report an unrecorded failure when the store is unavailable', async () => {
    const h = createHarness();
    await seedPending(h.store);
    jest.spyOn(h.store, 'save').mockRejectedValue(new PersistenceError('save task task-1', new Error('db down')));

    const outcome = await h.pipeline.execute({ taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 });

    expect(outcome).toEqual({
      status: 'failed',
      taskId: 'task-1',
      errorKind: 'persistence',
      errorMessage: 'save task task-1 failed: db down',
      recorded: false,
    });
    expect(h.events.map((e) => e.type)).toEqual(['review_task.failed']);
  });

  it('should stop writing once the run is abandoned', async () => {
    const h = createHarness();
    await seedPending(h.store);
    const controller = new AbortController();
    h.fetcher.getChangedFiles.mockImplementationOnce(async () => {
      controller.abort();
      return FILES;
    });

    const outcome = await h.pipeline.execute(
      { taskId: 'task-1', repoUrl: REPO_URL, prNumber: 42 },
      { signal: controller.signal },
    );

    expect(outcome).toEqual({ status: 'skipped', taskId: 'task-1', reason: 'abandoned' });
    expect(await h.store.get('task-1')).toMatchObject({ status: 'processing' });
    expect(h.reviewGenerator.review).not.toHaveBeenCalled();
    expect(h.progress.read('task-1')).toBeNull();
    expect(h.progress.size()).toBe(0);
  });
});
