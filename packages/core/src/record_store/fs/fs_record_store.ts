import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { ValidationError } from '../../errors';
import type { RecordStore } from '../record_store';

/**
 * Serializer for FsRecordStore - allows custom serialization
 */
export interface Serializer {
  stringify: (value: unknown) => string;
  parse: <T>(text: string) => T;
}

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions {
  /** Base directory for files */
  basePath: string;

  /** File extension (default: ".json") */
  extension?: string;

  /** Custom serializer (default: JSON with indent 2) */
  serializer?: Serializer;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}

const DEFAULT_SERIALIZER: Serializer = {
  stringify: (value) => JSON.stringify(value, null, 2),
  parse: (text) => JSON.parse(text),
};

// fs errors can come from another realm (Jest), so no instanceof Error
function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Rejects IDs that could escape basePath.
 * Blocks `..`, `/` and `\`; a single `.` is allowed.
 */
function validateId(id: string): void {
  if (!id) {
    throw new ValidationError('ID must be a non-empty string', 'id');
  }
  if (id.includes('..') || /[\/\\]/.test(id)) {
    throw new ValidationError(`Invalid ID: "${id}". IDs cannot contain /, \\, or ..`, 'id');
  }
}

/**
 * FsRecordStore<T> - one JSON file per record under `basePath`.
 *
 * Writes go to a temporary sibling first and are renamed into place,
 * so concurrent readers never observe a half-written record.
 *
 * @example
 * const store = new FsRecordStore<ReviewTask>({ basePath: '.revq/tasks' });
 * await store.put(task.id, task);
 */
export class FsRecordStore<T> implements RecordStore<T> {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly serializer: Serializer;
  private readonly createIfMissing: boolean;

  constructor(options: FsRecordStoreOptions) {
    this.basePath = options.basePath;
    this.extension = options.extension ?? '.json';
    this.serializer = options.serializer ?? DEFAULT_SERIALIZER;
    this.createIfMissing = options.createIfMissing ?? true;
  }

  private getFilePath(id: string): string {
    validateId(id);
    return path.join(this.basePath, `${id}${this.extension}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return this.serializer.parse<T>(content);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async put(id: string, value: T): Promise<void> {
    const filePath = this.getFilePath(id);
    if (this.createIfMissing) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }
    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tempPath, this.serializer.stringify(value), 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension))
        .map((f) => f.slice(0, -this.extension.length));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.getFilePath(id);
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }
}
