import type { ChangedFile, ChangeMetadata } from '../github';
import type { CodeChange, ReviewInput } from '../review_generator';

const UNKNOWN_LANGUAGE = 'unknown';

/**
 * Language tag for a changed file: the text after the last ".",
 * or "unknown" when the name has none.
 *
 * @example
 * inferLanguage('src/app.py'); // 'py'
 * inferLanguage('Dockerfile'); // 'unknown'
 */
export function inferLanguage(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? UNKNOWN_LANGUAGE : filename.slice(dot + 1);
}

export function toCodeChange(file: ChangedFile): CodeChange {
  return {
    filename: file.filename,
    language: inferLanguage(file.filename),
    diff: file.patch ?? '',
  };
}

/**
 * Normalizes fetched pull request data into the reviewer's input.
 */
export function buildReviewInput(metadata: ChangeMetadata, files: ChangedFile[]): ReviewInput {
  return {
    prInfo: {
      title: metadata.title,
      description: metadata.description ?? '',
    },
    codeChanges: files.map(toCodeChange),
  };
}
