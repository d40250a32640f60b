import { EventEmitter } from 'events';

import type { IJobQueue, JobDelivery, ReviewJob } from './job_queue.types';

type QueuedJob = {
  job: ReviewJob;
  deliveryCount: number;
};

export type MemoryJobQueueOptions = {
  /** Refuse new jobs beyond this many waiting (default: unbounded) */
  maxSize?: number;
};

const AVAILABLE = 'available';

/**
 * In-process FIFO queue with explicit acknowledgement.
 *
 * Handed-out jobs stay tracked as unacknowledged until `ack` or `nack`;
 * `nack(delivery, true)` re-appends them with their delivery count kept.
 */
export class MemoryJobQueue implements IJobQueue {
  private readonly waiting: QueuedJob[] = [];
  private readonly unacked = new Map<number, QueuedJob>();
  private readonly emitter = new EventEmitter();
  private readonly maxSize: number;
  private nextTag = 1;

  constructor(options: MemoryJobQueueOptions = {}) {
    this.maxSize = options.maxSize ?? Number.POSITIVE_INFINITY;
    this.emitter.setMaxListeners(100);
  }

  async enqueue(job: ReviewJob): Promise<void> {
    if (this.waiting.length >= this.maxSize) {
      throw new Error(`queue is full (${this.maxSize} jobs waiting)`);
    }
    this.waiting.push({ job: { ...job }, deliveryCount: 0 });
    this.emitter.emit(AVAILABLE);
  }

  async dequeue(): Promise<JobDelivery | null> {
    const next = this.waiting.shift();
    if (!next) {
      return null;
    }
    next.deliveryCount += 1;
    const deliveryTag = this.nextTag++;
    this.unacked.set(deliveryTag, next);
    return { job: { ...next.job }, deliveryCount: next.deliveryCount, deliveryTag };
  }

  async ack(delivery: JobDelivery): Promise<void> {
    this.unacked.delete(delivery.deliveryTag);
  }

  async nack(delivery: JobDelivery, requeue: boolean): Promise<void> {
    const entry = this.unacked.get(delivery.deliveryTag);
    if (!entry) {
      return;
    }
    this.unacked.delete(delivery.deliveryTag);
    if (requeue) {
      this.waiting.push(entry);
      this.emitter.emit(AVAILABLE);
    }
  }

  async remove(taskId: string): Promise<boolean> {
    const index = this.waiting.findIndex((entry) => entry.job.taskId === taskId);
    if (index === -1) {
      return false;
    }
    this.waiting.splice(index, 1);
    return true;
  }

  async size(): Promise<number> {
    return this.waiting.length;
  }

  onAvailable(listener: () => void): () => void {
    this.emitter.on(AVAILABLE, listener);
    return () => {
      this.emitter.removeListener(AVAILABLE, listener);
    };
  }

  /** Jobs handed out and not yet acknowledged */
  unackedCount(): number {
    return this.unacked.size;
  }
}
