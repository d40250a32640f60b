import type { RecordStore } from '../record_store';

/**
 * In-process RecordStore behind the `memory` backend.
 *
 * Values are structured-cloned in and out, so a record read back never
 * aliases the caller's object.
 */
export class MemoryRecordStore<T> implements RecordStore<T> {
  private readonly records = new Map<string, T>();

  async get(id: string): Promise<T | null> {
    const value = this.records.get(id);
    return value === undefined ? null : structuredClone(value);
  }

  async put(id: string, value: T): Promise<void> {
    this.records.set(id, structuredClone(value));
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()];
  }

  async exists(id: string): Promise<boolean> {
    return this.records.has(id);
  }
}
