import { EventBus } from '../event_bus';
import type { TaskProgressEvent } from '../event_bus';
import { ProgressTracker } from './progress_tracker';

describe('ProgressTracker', () => {
  it('should return null before anything is reported', () => {
    expect(new ProgressTracker().read('task-1')).toBeNull();
  });

  it('should keep the latest progress per task', () => {
    const tracker = new ProgressTracker();

    tracker.report('task-1', { current: 1, total: 4, phase: 'Initializing GitHub analyzer' });
    tracker.report('task-1', { current: 2, total: 4, phase: 'Fetching PR data' });
    tracker.report('task-2', { current: 1, total: 4, phase: 'Initializing GitHub analyzer' });

    expect(tracker.read('task-1')).toEqual({ current: 2, total: 4, phase: 'Fetching PR data' });
    expect(tracker.size()).toBe(2);
  });

  it('should forget a task once cleared', () => {
    const tracker = new ProgressTracker();
    tracker.report('task-1', { current: 4, total: 4, phase: 'Saving results' });

    tracker.clear('task-1');

    expect(tracker.read('task-1')).toBeNull();
  });

  it('should not expose its stored entry to mutation', () => {
    const tracker = new ProgressTracker();
    tracker.report('task-1', { current: 1, total: 4, phase: 'Initializing GitHub analyzer' });

    const read = tracker.read('task-1');
    if (read) read.current = 99;

    expect(tracker.read('task-1')?.current).toBe(1);
  });

  it('should publish a progress event per report', () => {
    const eventBus = new EventBus();
    const handler = jest.fn<void, [TaskProgressEvent]>();
    eventBus.subscribe('review_task.progress', handler);
    const tracker = new ProgressTracker({ eventBus });

    tracker.report('task-1', { current: 3, total: 4, phase: 'Running AI code review' });

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({
      type: 'review_task.progress',
      source: 'progress',
      payload: { taskId: 'task-1', current: 3, total: 4, phase: 'Running AI code review' },
    }));
  });
});
