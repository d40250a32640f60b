import { GenerationError } from '../errors';
import { HttpReviewGenerator, summarizeReview } from './http_review_generator';
import type { ReviewInput } from './review_generator.types';

const input: ReviewInput = {
  prInfo: { title: 'Add parser', description: 'Adds a parser' },
  codeChanges: [
    { filename: 'src/parser.ts', language: 'ts', diff: '@@ -0,0 +1,2 @@\n+const x = eval(input);' },
    { filename: 'README.md', language: 'md', diff: '' },
  ],
};

function completion(content: string | null): unknown {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

function mockFetchResolving(payload: unknown): jest.Mock {
  return jest.fn().mockResolvedValue({
    ok: true,
    status: 200,
    statusText: 'OK',
    json: async () => payload,
  });
}

describe('HttpReviewGenerator', () => {
  it('should normalize the model answer and recompute the summary', async () => {
    const modelAnswer = {
      files: [
        {
          name: 'src/parser.ts',
          issues: [
            { type: 'security', line: 1, description: 'eval on input', suggestion: 'Parse explicitly' },
            { type: 'style', line: null, description: 'Missing semicolon style', suggestion: 'Run the formatter' },
          ],
        },
        { name: 'README.md', issues: [] },
      ],
      summary: { totalFiles: 9, totalIssues: 9, criticalIssues: 9 },
    };
    const fetchFn = mockFetchResolving(completion(JSON.stringify(modelAnswer)));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1/chat/completions' }, { fetch: fetchFn });

    const report = await generator.review(input);

    expect(report).toEqual({
      files: [
        {
          name: 'src/parser.ts',
          issues: [
            { type: 'security', line: 1, description: 'eval on input', suggestion: 'Parse explicitly' },
            { type: 'style', description: 'Missing semicolon style', suggestion: 'Run the formatter' },
          ],
        },
        { name: 'README.md', issues: [] },
      ],
      summary: { totalFiles: 2, totalIssues: 2, criticalIssues: 1 },
    });
  });

  it('should send a JSON-object request with a Bearer token and model', async () => {
    const fetchFn = mockFetchResolving(completion('{"files":[]}'));
    const generator = new HttpReviewGenerator(
      { endpoint: 'https://llm.test/v1/chat/completions', apiKey: 'test-secret', model: 'review-model' },
      { fetch: fetchFn },
    );

    await generator.review(input);

    expect(fetchFn).toHaveBeenCalledWith(
      'https://llm.test/v1/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      }),
    );
    const body: unknown = JSON.parse(fetchFn.mock.calls[0][1].body);
    expect(body).toMatchObject({
      model: 'review-model',
      temperature: 0,
      response_format: { type: 'json_object' },
    });
    expect(body).toHaveProperty('messages.0.role', 'system');
    expect(body).toHaveProperty('messages.1.role', 'user');
  });

  it('should omit the Authorization header without an API key', async () => {
    const fetchFn = mockFetchResolving(completion('{"files":[]}'));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await generator.review(input);

    expect(fetchFn.mock.calls[0][1].headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should refuse input without code changes', async () => {
    const fetchFn = jest.fn();
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await expect(generator.review({ ...input, codeChanges: [] })).rejects.toThrow(
      'No code changes found in the review input',
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should raise a GenerationError on a non-2xx status', async () => {
    const fetchFn = jest.fn().mockResolvedValue({ ok: false, status: 429, statusText: 'Too Many Requests' });
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await expect(generator.review(input)).rejects.toThrow(new GenerationError('Review API error: 429 Too Many Requests'));
  });

  it('should raise a GenerationError when the network call fails', async () => {
    const fetchFn = jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await expect(generator.review(input)).rejects.toThrow('Review API request failed: connect ECONNREFUSED');
  });

  it('should reject content that is not JSON', async () => {
    const fetchFn = mockFetchResolving(completion('Looks good to me!'));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await expect(generator.review(input)).rejects.toThrow(/^Review is not valid JSON: /);
  });

  it('should reject an answer with an unknown issue type', async () => {
    const answer = { files: [{ name: 'a.ts', issues: [{ type: 'nitpick', description: 'd', suggestion: 's' }] }] };
    const fetchFn = mockFetchResolving(completion(JSON.stringify(answer)));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    const error = await generator.review(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toHaveProperty('kind', 'generation');
  });

  it('should reject an empty message', async () => {
    const fetchFn = mockFetchResolving(completion(null));
    const generator = new HttpReviewGenerator({ endpoint: 'https://llm.test/v1' }, { fetch: fetchFn });

    await expect(generator.review(input)).rejects.toThrow('Review API returned an empty message');
  });
});

describe('summarizeReview', () => {
  it('should count bug and security issues as critical', () => {
    expect(
      summarizeReview([
        {
          name: 'a.ts',
          issues: [
            { type: 'bug', description: 'd', suggestion: 's' },
            { type: 'performance', description: 'd', suggestion: 's' },
          ],
        },
        { name: 'b.ts', issues: [{ type: 'security', description: 'd', suggestion: 's' }] },
      ]),
    ).toEqual({ totalFiles: 2, totalIssues: 3, criticalIssues: 2 });
  });
});
