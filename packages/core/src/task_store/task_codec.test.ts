import { decodeTask, MalformedTaskError } from './task_codec';

const base = {
  id: 'task-1',
  repoUrl: 'https://github.com/o/r',
  prNumber: 3,
  createdAt: '2026-01-01T10:00:00.000Z',
};

describe('decodeTask', () => {
  it('should drop fields that do not belong to the status', () => {
    expect(decodeTask({ ...base, status: 'pending', errorMessage: null, results: null })).toEqual({
      ...base,
      status: 'pending',
    });
  });

  it('should decode a failed task that never started', () => {
    expect(
      decodeTask({ ...base, status: 'failed', startedAt: null, completedAt: '2026-01-01T10:00:02.000Z', errorMessage: 'boom' }),
    ).toEqual({ ...base, status: 'failed', completedAt: '2026-01-01T10:00:02.000Z', errorMessage: 'boom' });
  });

  it('should require startedAt on a processing task', () => {
    expect(() => decodeTask({ ...base, status: 'processing' })).toThrow('field "startedAt" must be a string');
  });

  it('should validate the results of a completed task', () => {
    const record = {
      ...base,
      status: 'completed',
      startedAt: '2026-01-01T10:00:01.000Z',
      completedAt: '2026-01-01T10:00:02.000Z',
      results: { prInfo: { title: 'T', description: '' }, codeChanges: 'nope', review: null },
      prTitle: 'T',
      author: null,
      filesCount: 0,
      additions: 0,
      deletions: 0,
    };

    expect(() => decodeTask(record)).toThrow(MalformedTaskError);
    expect(() => decodeTask(record)).toThrow('invalid results: /codeChanges: must be array');
  });

  describe('completed results', () => {
    const completed = {
      ...base,
      status: 'completed',
      startedAt: '2026-01-01T10:00:01.000Z',
      completedAt: '2026-01-01T10:00:02.000Z',
      prTitle: 'T',
      author: 'octocat',
      filesCount: 1,
      additions: 2,
      deletions: 0,
    };
    const prInfo = { title: 'T', description: '' };
    const codeChanges = [{ filename: 'a.py', language: 'py', diff: '@@' }];

    it('should accept a null review with its error', () => {
      const results = { prInfo, codeChanges, review: null, reviewError: 'Review API error: 503' };

      expect(decodeTask({ ...completed, results })).toEqual({ ...completed, results });
    });

    it('should accept a review report', () => {
      const review = {
        files: [{ name: 'a.py', issues: [{ type: 'bug', line: 4, description: 'Off by one', suggestion: 'Use <=' }] }],
        summary: { totalFiles: 1, totalIssues: 1, criticalIssues: 1 },
      };

      expect(decodeTask({ ...completed, results: { prInfo, codeChanges, review } })).toEqual({
        ...completed,
        results: { prInfo, codeChanges, review },
      });
    });

    it('should require the review key even when there is no review', () => {
      expect(() => decodeTask({ ...completed, results: { prInfo, codeChanges } })).toThrow(
        "invalid results: /review: must have required property 'review'",
      );
    });

    it('should reject a review without a summary', () => {
      expect(() => decodeTask({ ...completed, results: { prInfo, codeChanges, review: { files: [] } } })).toThrow(
        "invalid results: /review/summary: must have required property 'summary'",
      );
    });
  });

  it('should reject values that are not objects', () => {
    expect(() => decodeTask(null)).toThrow('record is not an object');
    expect(() => decodeTask([base])).toThrow('record is not an object');
  });
});
