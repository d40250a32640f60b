import type { WorkerSettings } from '../dispatcher';
import type { LogLevel } from '../logger';

export type StoreBackend = 'memory' | 'fs' | 'postgres';

export type StoreConfig = {
  backend: StoreBackend;
  /** Record directory of the fs backend */
  path: string;
  /** Connection string of the postgres backend */
  databaseUrl?: string;
};

export type GitHubConfig = {
  /** GitHub Enterprise API root; api.github.com when unset */
  apiBaseUrl?: string;
  /** Used when a submission carries no credential */
  token?: string;
};

export type ReviewConfig = {
  /** Chat-completions endpoint of the review model */
  endpoint?: string;
  apiKey?: string;
  model?: string;
};

export type ServiceConfig = {
  store: StoreConfig;
  github: GitHubConfig;
  review: ReviewConfig;
  worker: WorkerSettings;
  logLevel: LogLevel;
};

export type LoadServiceConfigOptions = {
  /** Environment to read; when omitted, `.env` is loaded into process.env first */
  env?: NodeJS.ProcessEnv;
  /** YAML file; otherwise REVQ_CONFIG, then revq.config.yaml in `cwd` when present */
  configPath?: string;
  /** Directory for relative paths (default: process.cwd()) */
  cwd?: string;
};
