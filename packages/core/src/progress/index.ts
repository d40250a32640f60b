export { ProgressTracker } from './progress_tracker';
export type { IProgressChannel, ProgressTrackerDependencies } from './progress_tracker';
