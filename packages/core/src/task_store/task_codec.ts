import type { SchemaObject } from 'ajv';

import { REVIEW_ISSUE_TYPES } from '../review_generator/review_report.schema';
import { compileSchemaObject, formatSchemaErrors } from '../schemas';
import { TASK_STATUSES } from '../task';
import type { ReviewTask, TaskResults, TaskStatus } from '../task';

const taskResultsSchema: SchemaObject = {
  type: 'object',
  properties: {
    prInfo: {
      type: 'object',
      properties: {
        title: { type: 'string' },
        description: { type: 'string' },
      },
      required: ['title', 'description'],
    },
    codeChanges: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          filename: { type: 'string' },
          language: { type: 'string' },
          diff: { type: 'string' },
        },
        required: ['filename', 'language', 'diff'],
      },
    },
    review: {
      type: 'object',
      nullable: true,
      properties: {
        files: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              issues: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    type: { type: 'string', enum: REVIEW_ISSUE_TYPES },
                    line: { type: 'integer', nullable: true },
                    description: { type: 'string' },
                    suggestion: { type: 'string' },
                  },
                  required: ['type', 'description', 'suggestion'],
                },
              },
            },
            required: ['name', 'issues'],
          },
        },
        summary: {
          type: 'object',
          properties: {
            totalFiles: { type: 'integer' },
            totalIssues: { type: 'integer' },
            criticalIssues: { type: 'integer' },
          },
          required: ['totalFiles', 'totalIssues', 'criticalIssues'],
        },
      },
      required: ['files', 'summary'],
    },
    reviewError: { type: 'string', nullable: true },
  },
  required: ['prInfo', 'codeChanges', 'review'],
};

const validateTaskResults = compileSchemaObject<TaskResults>(taskResultsSchema);

/**
 * Thrown when a stored record cannot be read back as a ReviewTask.
 */
export class MalformedTaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedTaskError';
    Object.setPrototypeOf(this, MalformedTaskError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

function requireString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new MalformedTaskError(`field "${key}" must be a string`);
  }
  return value;
}

function requireNumber(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedTaskError(`field "${key}" must be a number`);
  }
  return value;
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new MalformedTaskError(`field "${key}" must be a string`);
  }
  return value;
}

/**
 * Rebuilds a typed task from an untrusted stored value (JSON file, SQL row).
 * The per-status invariants are checked: results only on completed
 * records, errorMessage only on failed ones.
 */
export function decodeTask(value: unknown): ReviewTask {
  if (!isRecord(value)) {
    throw new MalformedTaskError('record is not an object');
  }

  const status = value['status'];
  if (!isTaskStatus(status)) {
    throw new MalformedTaskError(`unknown status "${String(status)}"`);
  }

  const base = {
    id: requireString(value, 'id'),
    repoUrl: requireString(value, 'repoUrl'),
    prNumber: requireNumber(value, 'prNumber'),
    createdAt: requireString(value, 'createdAt'),
  };

  switch (status) {
    case 'pending':
      return { ...base, status };
    case 'processing':
      return { ...base, status, startedAt: requireString(value, 'startedAt') };
    case 'completed': {
      const results = value['results'];
      if (!validateTaskResults(results)) {
        throw new MalformedTaskError(`invalid results: ${formatSchemaErrors(validateTaskResults.errors)}`);
      }
      return {
        ...base,
        status,
        startedAt: requireString(value, 'startedAt'),
        completedAt: requireString(value, 'completedAt'),
        results,
        prTitle: requireString(value, 'prTitle'),
        author: optionalString(value, 'author') ?? null,
        filesCount: requireNumber(value, 'filesCount'),
        additions: requireNumber(value, 'additions'),
        deletions: requireNumber(value, 'deletions'),
      };
    }
    case 'failed': {
      const startedAt = optionalString(value, 'startedAt');
      return {
        ...base,
        status,
        ...(startedAt !== undefined ? { startedAt } : {}),
        completedAt: requireString(value, 'completedAt'),
        errorMessage: requireString(value, 'errorMessage'),
      };
    }
  }
}
