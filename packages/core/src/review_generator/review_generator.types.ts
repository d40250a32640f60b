/**
 * Issue categories the reviewer may report.
 * "bug" and "security" count as critical.
 */
export type ReviewIssueType = 'bug' | 'style' | 'performance' | 'security' | 'best_practice';

export const CRITICAL_ISSUE_TYPES: readonly ReviewIssueType[] = ['bug', 'security'];

export type ReviewIssue = {
  type: ReviewIssueType;
  /** Line number, when identifiable from the diff */
  line?: number;
  description: string;
  suggestion: string;
};

export type ReviewedFile = {
  name: string;
  issues: ReviewIssue[];
};

export type ReviewSummary = {
  totalFiles: number;
  totalIssues: number;
  criticalIssues: number;
};

/**
 * Structured findings for one pull request.
 */
export type ReviewReport = {
  files: ReviewedFile[];
  summary: ReviewSummary;
};

/**
 * One changed file as handed to the reviewer.
 */
export type CodeChange = {
  filename: string;
  /** Extension of the filename, or "unknown" */
  language: string;
  /** Unified diff text, "" when the host returned none */
  diff: string;
};

export type PullRequestInfo = {
  title: string;
  description: string;
};

/**
 * Normalized review input built by the analyze stage.
 */
export type ReviewInput = {
  prInfo: PullRequestInfo;
  codeChanges: CodeChange[];
};

/**
 * Review Generator contract. Any rejection is treated as non-fatal by the pipeline.
 */
export interface IReviewGenerator {
  review(input: ReviewInput): Promise<ReviewReport>;
}

/**
 * Configuration for the HTTP review generator.
 */
export type HttpReviewGeneratorOptions = {
  /** Chat-completions endpoint URL */
  endpoint: string;
  /** Bearer token (omitted from the request when absent) */
  apiKey?: string;
  /** Model name sent with the request */
  model?: string;
  /** Sampling temperature (default: 0) */
  temperature?: number;
};

/**
 * HTTP fetch function signature for dependency injection.
 * Defaults to globalThis.fetch.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;
