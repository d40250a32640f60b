export { JobDispatcher } from './job_dispatcher';
export { DEFAULT_WORKER_SETTINGS, MAX_TASK_TIME_LIMIT_SECONDS, MAX_TIMER_DELAY_MS } from './dispatcher.types';
export type {
  IJobExecutor,
  JobDispatcherDependencies,
  SubmitRequest,
  SubmitResult,
  WorkerSettings,
} from './dispatcher.types';
