import { describe, it } from 'node:test';
import assert from 'node:assert';
import { reviewJson } from '../testing/fakes.js';
import {
  mergeChunkResults,
  parseFailureResult,
  parseReviewResponse,
  toLabel,
} from './review-parser.js';
import { SEVERITIES } from './review-engine-types.js';

void describe('review-parser', async () => {
  await describe('parseReviewResponse', async () => {
    await it('falls back when there is no JSON object', () => {
      assert.deepStrictEqual(parseReviewResponse('I could not review this.'), {
        issues: [],
        summary: 'Error parsing OpenAI response',
        overallScore: 0,
        recommendations: ['Review the code manually'],
      });
    });

    await it('falls back on malformed JSON', () => {
      assert.deepStrictEqual(parseReviewResponse('{"issues": [,]}'), parseFailureResult());
    });

    await it('reads an object wrapped in prose and a code fence', () => {
      const raw = 'Here is the review:\n```json\n' + JSON.stringify({
        issues: [{
          severity: 'high',
          category: 'security',
          title: 'SQL injection',
          description: 'Query built from input',
          line_number: 12,
          file_path: 'src/db.ts',
          suggestion: 'Use parameters',
        }],
        summary: 'One problem',
        overall_score: 72,
        recommendations: ['Parameterize queries'],
      }) + '\n```\nThanks!';

      assert.deepStrictEqual(parseReviewResponse(raw), {
        issues: [{
          severity: { known: true, value: 'high' },
          category: { known: true, value: 'security' },
          title: 'SQL injection',
          description: 'Query built from input',
          lineNumber: 12,
          filePath: 'src/db.ts',
          suggestion: 'Use parameters',
        }],
        summary: 'One problem',
        overallScore: 72,
        recommendations: ['Parameterize queries'],
      });
    });

    await it('fills defaults and keeps unknown labels', () => {
      const result = parseReviewResponse(JSON.stringify({
        issues: [{ severity: 'urgent', line_number: 'ten' }, 'not an issue'],
        overall_score: 'high',
        recommendations: ['ok', 3],
      }));

      assert.deepStrictEqual(result, {
        issues: [{
          severity: { known: false, value: 'urgent' },
          category: { known: true, value: 'best_practice' },
          title: '',
          description: '',
          lineNumber: undefined,
          filePath: undefined,
          suggestion: undefined,
        }],
        summary: '',
        overallScore: 0,
        recommendations: ['ok'],
      });
    });

    await it('accepts numbers quoted as strings', () => {
      const result = parseReviewResponse(JSON.stringify({
        issues: [{ title: 'quoted', line_number: '42' }, { title: 'zero', line_number: 0 }, { title: 'negative', line_number: '-3' }],
        overall_score: ' 85 ',
      }));

      assert.strictEqual(result.overallScore, 85);
      assert.deepStrictEqual(result.issues.map(i => i.lineNumber), [42, undefined, undefined]);
    });
  });

  await describe('toLabel', async () => {
    await it('separates known values from anything else', () => {
      assert.deepStrictEqual(toLabel('low', SEVERITIES), { known: true, value: 'low' });
      assert.deepStrictEqual(toLabel('LOW', SEVERITIES), { known: false, value: 'LOW' });
    });
  });

  await describe('mergeChunkResults', async () => {
    await it('averages scores of the chunks that answered, rounding down', () => {
      const merged = mergeChunkResults(
        [parseReviewResponse(reviewJson(90)), parseReviewResponse(reviewJson(71))],
        3
      );

      assert.strictEqual(merged.overallScore, 80);
      assert.strictEqual(merged.summary, 'Analyzed 3 files with 0 total issues found');
    });

    await it('scores zero when no chunk answered', () => {
      assert.deepStrictEqual(mergeChunkResults([], 2), {
        issues: [],
        summary: 'Analyzed 2 files with 0 total issues found',
        overallScore: 0,
        recommendations: [],
      });
    });

    await it('keeps the first five distinct recommendations in order', () => {
      const results = [0, 1, 2, 3].map(chunk =>
        parseReviewResponse(reviewJson(50, [], [0, 1, 2, 3].map(i => `rec ${chunk * 4 + i}`)))
      );

      assert.deepStrictEqual(
        mergeChunkResults(results, 4).recommendations,
        ['rec 0', 'rec 1', 'rec 2', 'rec 3', 'rec 4']
      );
    });

    await it('drops repeated recommendations before capping', () => {
      const results = [
        parseReviewResponse(reviewJson(50, [], ['Add tests', 'Use const'])),
        parseReviewResponse(reviewJson(50, [], ['Add tests', 'Handle errors'])),
      ];

      assert.deepStrictEqual(mergeChunkResults(results, 2).recommendations, ['Add tests', 'Use const', 'Handle errors']);
    });

    await it('concatenates issues in chunk order', () => {
      const results = [
        parseReviewResponse(reviewJson(80, [{ title: 'first' }])),
        parseReviewResponse(reviewJson(80, [{ title: 'second' }, { title: 'third' }])),
      ];

      const merged = mergeChunkResults(results, 2);
      assert.deepStrictEqual(merged.issues.map(i => i.title), ['first', 'second', 'third']);
      assert.strictEqual(merged.summary, 'Analyzed 2 files with 3 total issues found');
    });
  });
});
