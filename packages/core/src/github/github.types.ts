/**
 * Types for the change fetcher boundary and its GitHub implementation.
 */

export type { Octokit } from '@octokit/rest';

/**
 * Pull request metadata as needed by the pipeline.
 */
export type ChangeMetadata = {
  title: string;
  /** PR body; null when the author left it empty */
  description: string | null;
  /** Login of the PR author, null for deleted accounts */
  author: string | null;
};

/**
 * One file touched by the pull request.
 */
export type ChangedFile = {
  filename: string;
  additions: number;
  deletions: number;
  /** Unified diff; absent for binary or oversized files */
  patch?: string;
};

/**
 * External Data Fetcher contract. Rejections are TransportErrors.
 */
export interface IChangeFetcher {
  getChangeMetadata(owner: string, repo: string, prNumber: number): Promise<ChangeMetadata>;
  getChangedFiles(owner: string, repo: string, prNumber: number): Promise<ChangedFile[]>;
}

/**
 * Builds a fetcher bound to a credential (or the configured default).
 */
export type ChangeFetcherFactory = (credential?: string) => IChangeFetcher;

export type RepositoryRef = {
  owner: string;
  repo: string;
};

/**
 * Semantic codes that abstract HTTP status codes.
 */
export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR';

export type GitHubFetcherFactoryOptions = {
  /** REST API base URL (default: https://api.github.com) */
  baseUrl?: string;
  /** Token used when a submission carries no credential */
  defaultToken?: string;
  /** User-Agent header */
  userAgent?: string;
};
