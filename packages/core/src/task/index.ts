export {
  ALLOWED_TRANSITIONS,
  canTransition,
  assertTransition,
  isTerminal,
  createPendingTask,
  startTask,
  completeTask,
  failTask,
} from './task_lifecycle';
export { TASK_STATUSES } from './task.types';
export type {
  TaskStatus,
  TerminalStatus,
  TaskResults,
  TaskMetadata,
  PendingTask,
  ProcessingTask,
  CompletedTask,
  FailedTask,
  ReviewTask,
  TerminalTask,
  TaskProgress,
} from './task.types';
