/**
 * Work item handed from the dispatcher to a worker.
 */
export type ReviewJob = {
  taskId: string;
  repoUrl: string;
  prNumber: number;
  /** Code host token for this submission */
  credential?: string;
};

/**
 * One hand-out of a job. The same job may be delivered more than once.
 */
export type JobDelivery = {
  job: ReviewJob;
  /** 1 on first delivery */
  deliveryCount: number;
  /** Identifies this hand-out for ack/nack */
  deliveryTag: number;
};

/**
 * At-least-once job queue contract.
 */
export interface IJobQueue {
  /** Rejects when the queue cannot accept the job */
  enqueue(job: ReviewJob): Promise<void>;
  /** Next job without waiting, or null when the queue is empty */
  dequeue(): Promise<JobDelivery | null>;
  ack(delivery: JobDelivery): Promise<void>;
  /** `requeue` puts the job back at the tail; otherwise it is discarded */
  nack(delivery: JobDelivery, requeue: boolean): Promise<void>;
  /** Removes a job that has not been handed out yet */
  remove(taskId: string): Promise<boolean>;
  /** Jobs waiting to be handed out */
  size(): Promise<number>;
  /** Calls `listener` whenever a job becomes available; returns an unsubscribe function */
  onAvailable(listener: () => void): () => void;
}
