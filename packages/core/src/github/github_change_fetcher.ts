/**
 * GitHubChangeFetcher: IChangeFetcher via the GitHub REST API (Octokit)
 *
 * Reads pull request metadata and the paginated changed-file list.
 * Every failure surfaces as a GitHubApiError; there is no retry here.
 */

import { Octokit } from '@octokit/rest';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { mapOctokitError } from './github_errors';
import type {
  ChangedFile,
  ChangeFetcherFactory,
  ChangeMetadata,
  GitHubFetcherFactoryOptions,
  IChangeFetcher,
} from './github.types';

const FILES_PER_PAGE = 100;
const DEFAULT_USER_AGENT = 'revq-review-queue';

export type GitHubChangeFetcherDependencies = {
  octokit: Octokit;
  logger?: Logger;
};

export class GitHubChangeFetcher implements IChangeFetcher {
  private readonly octokit: Octokit;
  private readonly logger: Logger;

  constructor(deps: GitHubChangeFetcherDependencies) {
    this.octokit = deps.octokit;
    this.logger = deps.logger ?? createLogger('[GitHubChangeFetcher] ');
  }

  async getChangeMetadata(owner: string, repo: string, prNumber: number): Promise<ChangeMetadata> {
    const context = `pull request ${owner}/${repo}#${prNumber}`;
    try {
      const { data } = await this.octokit.rest.pulls.get({
        owner,
        repo,
        pull_number: prNumber,
      });
      return {
        title: data.title,
        description: data.body ?? null,
        author: data.user?.login ?? null,
      };
    } catch (error) {
      throw mapOctokitError(error, context);
    }
  }

  async getChangedFiles(owner: string, repo: string, prNumber: number): Promise<ChangedFile[]> {
    const context = `files of pull request ${owner}/${repo}#${prNumber}`;
    try {
      const files = await this.octokit.paginate(this.octokit.rest.pulls.listFiles, {
        owner,
        repo,
        pull_number: prNumber,
        per_page: FILES_PER_PAGE,
      });
      this.logger.debug(`Fetched ${files.length} changed files for ${owner}/${repo}#${prNumber}`);

      return files.map((file) => {
        const changed: ChangedFile = {
          filename: file.filename,
          additions: file.additions,
          deletions: file.deletions,
        };
        if (file.patch !== undefined) changed.patch = file.patch;
        return changed;
      });
    } catch (error) {
      throw mapOctokitError(error, context);
    }
  }
}

/**
 * Returns a factory that builds one Octokit-backed fetcher per credential.
 * A submission without a credential falls back to `defaultToken`, then to anonymous access.
 */
export function createGitHubFetcherFactory(
  options: GitHubFetcherFactoryOptions = {},
  logger?: Logger,
): ChangeFetcherFactory {
  return (credential?: string) => {
    const auth = credential ?? options.defaultToken;
    const octokit = new Octokit({
      ...(auth ? { auth } : {}),
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    });
    return new GitHubChangeFetcher(logger ? { octokit, logger } : { octokit });
  };
}
