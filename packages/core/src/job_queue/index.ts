export { MemoryJobQueue } from './memory_job_queue';
export type { MemoryJobQueueOptions } from './memory_job_queue';
export type { IJobQueue, JobDelivery, ReviewJob } from './job_queue.types';
