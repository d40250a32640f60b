import { TransportError } from '../errors';
import type { GitHubApiErrorCode } from './github.types';

/**
 * Typed error for GitHub API operations.
 * A TransportError, so the pipeline treats it as fatal.
 */
export class GitHubApiError extends TransportError {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError.
 */
export function mapOctokitError(error: unknown, context: string): GitHubApiError {
  if (error instanceof GitHubApiError) {
    return error;
  }

  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409 || status === 422) {
      return new GitHubApiError(`Conflict: ${context}`, 'CONFLICT', status);
    }
    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${message}`, 'NETWORK_ERROR');
}
