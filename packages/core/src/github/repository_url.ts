import { ValidationError } from '../errors';
import type { RepositoryRef } from './github.types';

const INVALID_URL_MESSAGE = 'Invalid GitHub repository URL';

/**
 * Extracts owner and repository name from the first two path segments.
 *
 * @example
 * parseRepositoryUrl('https://github.com/octo/widgets/'); // { owner: 'octo', repo: 'widgets' }
 */
export function parseRepositoryUrl(repoUrl: string): RepositoryRef {
  let pathname: string;
  try {
    pathname = new URL(repoUrl).pathname;
  } catch {
    throw new ValidationError(INVALID_URL_MESSAGE, 'repoUrl');
  }

  const [owner, repo] = pathname.split('/').filter((segment) => segment.length > 0);
  if (!owner || !repo) {
    throw new ValidationError(INVALID_URL_MESSAGE, 'repoUrl');
  }
  return { owner, repo };
}
