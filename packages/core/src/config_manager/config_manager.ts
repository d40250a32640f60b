import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { config as loadDotEnv } from 'dotenv';
import type { JSONSchemaType } from 'ajv';

import { DEFAULT_WORKER_SETTINGS, MAX_TASK_TIME_LIMIT_SECONDS, MAX_TIMER_DELAY_MS } from '../dispatcher';
import { ValidationError, toErrorMessage } from '../errors';
import { compileSchema, formatSchemaErrors } from '../schemas';
import type { LoadServiceConfigOptions, ServiceConfig } from './config_manager.types';

export const DEFAULT_CONFIG_FILE = 'revq.config.yaml';

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  store: { backend: 'fs', path: '.revq/tasks' },
  github: {},
  review: {},
  worker: { ...DEFAULT_WORKER_SETTINGS },
  logLevel: 'info',
};

const serviceConfigSchema: JSONSchemaType<ServiceConfig> = {
  type: 'object',
  properties: {
    store: {
      type: 'object',
      properties: {
        backend: { type: 'string', enum: ['memory', 'fs', 'postgres'] },
        path: { type: 'string', minLength: 1 },
        databaseUrl: { type: 'string', minLength: 1, nullable: true },
      },
      required: ['backend', 'path'],
      additionalProperties: false,
    },
    github: {
      type: 'object',
      properties: {
        apiBaseUrl: { type: 'string', format: 'uri', nullable: true },
        token: { type: 'string', nullable: true },
      },
      required: [],
      additionalProperties: false,
    },
    review: {
      type: 'object',
      properties: {
        endpoint: { type: 'string', format: 'uri', nullable: true },
        apiKey: { type: 'string', nullable: true },
        model: { type: 'string', nullable: true },
      },
      required: [],
      additionalProperties: false,
    },
    worker: {
      type: 'object',
      properties: {
        concurrency: { type: 'integer', minimum: 1 },
        maxDeliveries: { type: 'integer', minimum: 1 },
        taskTimeLimitSeconds: { type: 'number', exclusiveMinimum: 0, maximum: MAX_TASK_TIME_LIMIT_SECONDS },
        pollIntervalMs: { type: 'integer', minimum: 1, maximum: MAX_TIMER_DELAY_MS },
      },
      required: ['concurrency', 'maxDeliveries', 'taskTimeLimitSeconds', 'pollIntervalMs'],
      additionalProperties: false,
    },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
  required: ['store', 'github', 'review', 'worker', 'logLevel'],
  additionalProperties: false,
};

const validateServiceConfig = compileSchema(serviceConfigSchema);

type Layer = Record<string, unknown>;

type EnvBinding = {
  name: string;
  /** Top-level key when absent */
  section?: 'store' | 'github' | 'review' | 'worker';
  key: string;
  numeric?: boolean;
};

const ENV_BINDINGS: EnvBinding[] = [
  { name: 'REVQ_STORE', section: 'store', key: 'backend' },
  { name: 'REVQ_STORE_PATH', section: 'store', key: 'path' },
  { name: 'DATABASE_URL', section: 'store', key: 'databaseUrl' },
  { name: 'GITHUB_API_URL', section: 'github', key: 'apiBaseUrl' },
  { name: 'GITHUB_TOKEN', section: 'github', key: 'token' },
  { name: 'REVIEW_API_URL', section: 'review', key: 'endpoint' },
  { name: 'REVIEW_API_KEY', section: 'review', key: 'apiKey' },
  { name: 'REVIEW_MODEL', section: 'review', key: 'model' },
  { name: 'WORKER_CONCURRENCY', section: 'worker', key: 'concurrency', numeric: true },
  { name: 'WORKER_MAX_DELIVERIES', section: 'worker', key: 'maxDeliveries', numeric: true },
  { name: 'TASK_TIME_LIMIT_SECONDS', section: 'worker', key: 'taskTimeLimitSeconds', numeric: true },
  { name: 'WORKER_POLL_INTERVAL_MS', section: 'worker', key: 'pollIntervalMs', numeric: true },
  { name: 'LOG_LEVEL', key: 'logLevel' },
];

function isRecord(value: unknown): value is Layer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merges plain objects; later layers win. Inputs are not mutated.
 */
function mergeLayers(...layers: Layer[]): Layer {
  const merged: Layer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] = isRecord(value) ? mergeLayers(isRecord(current) ? current : {}, value) : value;
    }
  }
  return merged;
}

// Non-numeric text is kept so that the schema reports it
function parseNumeric(raw: string): number | string {
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
}

function envLayer(env: NodeJS.ProcessEnv): Layer {
  const layer: Layer = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined || raw === '') continue;
    const value = binding.numeric ? parseNumeric(raw) : raw;
    if (!binding.section) {
      layer[binding.key] = value;
      continue;
    }
    const section = layer[binding.section];
    if (isRecord(section)) {
      section[binding.key] = value;
    } else {
      layer[binding.section] = { [binding.key]: value };
    }
  }
  return layer;
}

function resolveConfigFile(options: LoadServiceConfigOptions, env: NodeJS.ProcessEnv, cwd: string): string | null {
  const explicit = options.configPath ?? env['REVQ_CONFIG'];
  if (explicit) {
    return path.resolve(cwd, explicit);
  }
  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : null;
}

function readConfigFile(filePath: string): Layer {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ValidationError(`Cannot read config file ${filePath}: ${toErrorMessage(error)}`, 'configPath');
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    throw new ValidationError(`Invalid YAML in ${filePath}: ${toErrorMessage(error)}`, 'configPath');
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Config file ${filePath} must contain a mapping`, 'configPath');
  }
  return parsed;
}

/**
 * Builds the service configuration from defaults, an optional YAML file
 * and environment variables, in that order of precedence.
 *
 * @throws {ValidationError} when the file cannot be read or the result fails validation
 *
 * @example
 * ```typescript
 * const config = loadServiceConfig();
 * const service = createReviewService(config);
 * ```
 */
export function loadServiceConfig(options: LoadServiceConfigOptions = {}): ServiceConfig {
  const cwd = options.cwd ?? process.cwd();
  if (!options.env) {
    loadDotEnv({ path: path.join(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  const configFile = resolveConfigFile(options, env, cwd);
  const fileLayer = configFile ? readConfigFile(configFile) : {};

  const merged = mergeLayers(DEFAULT_SERVICE_CONFIG, fileLayer, envLayer(env));
  if (!validateServiceConfig(merged)) {
    throw new ValidationError(`Invalid configuration: ${formatSchemaErrors(validateServiceConfig.errors)}`);
  }
  if (merged.store.backend === 'postgres' && !merged.store.databaseUrl) {
    throw new ValidationError('store.databaseUrl is required for the postgres backend', 'store.databaseUrl');
  }

  return {
    store: { ...merged.store, path: path.resolve(cwd, merged.store.path) },
    github: merged.github,
    review: merged.review,
    worker: merged.worker,
    logLevel: merged.logLevel,
  };
}
