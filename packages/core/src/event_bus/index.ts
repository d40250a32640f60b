export { EventBus, createTaskEvent, subscribeToTaskEvent } from './event_bus';
export type { IEventStream, EventBusDependencies } from './event_bus';
export type {
  BaseEvent,
  EventHandler,
  EventSubscription,
  ReviewTaskEvent,
  ReviewTaskEventType,
  TaskEventOf,
  TaskEventPayloads,
  TaskSubmittedEvent,
  TaskStartedEvent,
  TaskProgressEvent,
  TaskCompletedEvent,
  TaskFailedEvent,
  TaskCancelledEvent,
  TaskTimedOutEvent,
} from './types';
