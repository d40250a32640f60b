export { HttpReviewGenerator, buildReviewPrompt, summarizeReview } from './http_review_generator';
export type { HttpReviewGeneratorDependencies } from './http_review_generator';
export { REVIEW_ISSUE_TYPES } from './review_report.schema';
export { CRITICAL_ISSUE_TYPES } from './review_generator.types';
export type {
  ReviewIssueType,
  ReviewIssue,
  ReviewedFile,
  ReviewSummary,
  ReviewReport,
  CodeChange,
  PullRequestInfo,
  ReviewInput,
  IReviewGenerator,
  HttpReviewGeneratorOptions,
  FetchFn,
} from './review_generator.types';
