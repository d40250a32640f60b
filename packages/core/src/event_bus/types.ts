/**
 * Event Bus types for review task lifecycle notifications
 */

import type { ErrorKind } from '../errors';
import type { TaskProgress, TaskStatus } from '../task';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (epoch ms) */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Component that emitted the event */
  source: string;
};

export type TaskSubmittedEvent = BaseEvent & {
  type: 'review_task.submitted';
  payload: {
    taskId: string;
    repoUrl: string;
    prNumber: number;
  };
};

export type TaskStartedEvent = BaseEvent & {
  type: 'review_task.started';
  payload: {
    taskId: string;
    /** 1 on first delivery */
    deliveryCount: number;
  };
};

export type TaskProgressEvent = BaseEvent & {
  type: 'review_task.progress';
  payload: TaskProgress & {
    taskId: string;
  };
};

export type TaskCompletedEvent = BaseEvent & {
  type: 'review_task.completed';
  payload: {
    taskId: string;
    filesCount: number;
    /** False when the review generator failed */
    reviewed: boolean;
  };
};

export type TaskFailedEvent = BaseEvent & {
  type: 'review_task.failed';
  payload: {
    taskId: string;
    errorKind: ErrorKind;
    errorMessage: string;
  };
};

export type TaskCancelledEvent = BaseEvent & {
  type: 'review_task.cancelled';
  payload: {
    taskId: string;
    /** True when the job was still queued and got removed */
    removed: boolean;
  };
};

export type TaskTimedOutEvent = BaseEvent & {
  type: 'review_task.timed_out';
  payload: {
    taskId: string;
    timeLimitSeconds: number;
    /** Durable status at the time the worker gave up */
    status: TaskStatus;
  };
};

/**
 * Union type of all possible events
 */
export type ReviewTaskEvent =
  | TaskSubmittedEvent
  | TaskStartedEvent
  | TaskProgressEvent
  | TaskCompletedEvent
  | TaskFailedEvent
  | TaskCancelledEvent
  | TaskTimedOutEvent;

export type ReviewTaskEventType = ReviewTaskEvent['type'];

/**
 * Payload type per lifecycle event type
 */
export type TaskEventPayloads = {
  [E in ReviewTaskEvent as E['type']]: E['payload'];
};

export type TaskEventOf<K extends ReviewTaskEventType> = BaseEvent & {
  type: K;
  payload: TaskEventPayloads[K];
};

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to */
  eventType: string;
  /** Listener registered on the emitter */
  handler(event: BaseEvent): void;
};
