import type { SchemaObject } from 'ajv';

import { GenerationError, toErrorMessage } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { compileSchema, compileSchemaObject, formatSchemaErrors } from '../schemas';
import { modelReviewOutputSchema } from './review_report.schema';
import type { ModelReviewOutput } from './review_report.schema';
import {
  CRITICAL_ISSUE_TYPES,
} from './review_generator.types';
import type {
  FetchFn,
  HttpReviewGeneratorOptions,
  IReviewGenerator,
  ReviewedFile,
  ReviewInput,
  ReviewIssue,
  ReviewReport,
  ReviewSummary,
} from './review_generator.types';

type ChatCompletionResponse = {
  choices: Array<{ message: { content: string | null } }>;
};

const chatCompletionSchema: SchemaObject = {
  type: 'object',
  properties: {
    choices: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          message: {
            type: 'object',
            properties: {
              content: { type: 'string', nullable: true },
            },
            required: ['content'],
          },
        },
        required: ['message'],
      },
    },
  },
  required: ['choices'],
};

const validateCompletion = compileSchemaObject<ChatCompletionResponse>(chatCompletionSchema);
const validateModelOutput = compileSchema(modelReviewOutputSchema);

const USER_INSTRUCTION =
  'Review every file of this pull request and answer with the JSON object described above.';

/**
 * System prompt carrying the review criteria and the JSON-encoded changes.
 */
export function buildReviewPrompt(input: ReviewInput): string {
  return [
    'You review pull requests. Look at every changed file for:',
    '- potential bugs or errors',
    '- security problems',
    '- performance improvements',
    '- code style and formatting',
    '- best practices',
    '',
    'Report issues per file, with the line number when the diff shows it, and a concrete suggestion for each.',
    '',
    `Title: ${input.prInfo.title}`,
    `Description: ${input.prInfo.description || 'N/A'}`,
    `Files to review: ${input.codeChanges.length}`,
    '',
    'Code changes:',
    JSON.stringify(input.codeChanges, null, 2),
    '',
    'Answer with a JSON object: {"files": [{"name": string, "issues": [{"type": "bug" | "style" | "performance" | "security" | "best_practice", "line": number | null, "description": string, "suggestion": string}]}]}.',
    'Include every reviewed file, also those without issues.',
  ].join('\n');
}

/**
 * Counts files, issues and critical (bug or security) issues.
 */
export function summarizeReview(files: ReviewedFile[]): ReviewSummary {
  let totalIssues = 0;
  let criticalIssues = 0;
  for (const file of files) {
    totalIssues += file.issues.length;
    criticalIssues += file.issues.filter((issue) => CRITICAL_ISSUE_TYPES.includes(issue.type)).length;
  }
  return { totalFiles: files.length, totalIssues, criticalIssues };
}

function toReport(output: ModelReviewOutput): ReviewReport {
  const files: ReviewedFile[] = output.files.map((file) => ({
    name: file.name,
    issues: file.issues.map((raw) => {
      const issue: ReviewIssue = {
        type: raw.type,
        description: raw.description,
        suggestion: raw.suggestion,
      };
      if (typeof raw.line === 'number') issue.line = raw.line;
      return issue;
    }),
  }));
  return { files, summary: summarizeReview(files) };
}

export type HttpReviewGeneratorDependencies = {
  fetch?: FetchFn;
  logger?: Logger;
};

/**
 * Review generator speaking the OpenAI-compatible chat-completions protocol.
 *
 * Requests a JSON object, validates it against the report schema and
 * recomputes the summary instead of trusting the model's counts.
 * Every failure is a GenerationError.
 */
export class HttpReviewGenerator implements IReviewGenerator {
  private readonly options: HttpReviewGeneratorOptions;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: HttpReviewGeneratorOptions, deps: HttpReviewGeneratorDependencies = {}) {
    this.options = options;
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.logger = deps.logger ?? createLogger('[HttpReviewGenerator] ');
  }

  async review(input: ReviewInput): Promise<ReviewReport> {
    if (input.codeChanges.length === 0) {
      throw new GenerationError('No code changes found in the review input');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    const body = {
      ...(this.options.model ? { model: this.options.model } : {}),
      temperature: this.options.temperature ?? 0,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: buildReviewPrompt(input) },
        { role: 'user', content: USER_INSTRUCTION },
      ],
    };

    let response: Response;
    try {
      response = await this.fetchFn(this.options.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new GenerationError(`Review API request failed: ${toErrorMessage(error)}`);
    }

    if (!response.ok) {
      throw new GenerationError(`Review API error: ${response.status} ${response.statusText}`);
    }

    const payload = await this.readJson(response);
    if (!validateCompletion(payload)) {
      throw new GenerationError(`Unexpected review API response: ${formatSchemaErrors(validateCompletion.errors)}`);
    }

    const content = payload.choices[0]?.message.content;
    if (!content) {
      throw new GenerationError('Review API returned an empty message');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new GenerationError(`Review is not valid JSON: ${toErrorMessage(error)}`);
    }

    if (!validateModelOutput(parsed)) {
      throw new GenerationError(`Review does not match the report schema: ${formatSchemaErrors(validateModelOutput.errors)}`);
    }

    const report = toReport(parsed);
    this.logger.debug(`Review produced ${report.summary.totalIssues} issues across ${report.summary.totalFiles} files`);
    return report;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new GenerationError(`Review API returned invalid JSON: ${toErrorMessage(error)}`);
    }
  }
}
