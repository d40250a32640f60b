import type { JSONSchemaType } from 'ajv';
import type { ReviewIssueType } from './review_generator.types';

export const REVIEW_ISSUE_TYPES: readonly ReviewIssueType[] = [
  'bug',
  'style',
  'performance',
  'security',
  'best_practice',
];

/**
 * Shape of the model's answer before normalization.
 * `line` may come back as null; any summary the model adds is ignored.
 */
export type ModelReviewOutput = {
  files: Array<{
    name: string;
    issues: Array<{
      type: ReviewIssueType;
      line?: number | null;
      description: string;
      suggestion: string;
    }>;
  }>;
};

export const modelReviewOutputSchema: JSONSchemaType<ModelReviewOutput> = {
  type: 'object',
  properties: {
    files: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          issues: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                type: { type: 'string', enum: REVIEW_ISSUE_TYPES },
                line: { type: 'integer', nullable: true },
                description: { type: 'string' },
                suggestion: { type: 'string' },
              },
              required: ['type', 'description', 'suggestion'],
            },
          },
        },
        required: ['name', 'issues'],
      },
    },
  },
  required: ['files'],
};
