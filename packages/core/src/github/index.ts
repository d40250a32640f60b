export { GitHubChangeFetcher, createGitHubFetcherFactory } from './github_change_fetcher';
export type { GitHubChangeFetcherDependencies } from './github_change_fetcher';
export { GitHubApiError, isOctokitRequestError, mapOctokitError } from './github_errors';
export { parseRepositoryUrl } from './repository_url';
export type {
  Octokit,
  ChangeMetadata,
  ChangedFile,
  IChangeFetcher,
  ChangeFetcherFactory,
  RepositoryRef,
  GitHubApiErrorCode,
  GitHubFetcherFactoryOptions,
} from './github.types';
