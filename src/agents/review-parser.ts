// src/agents/review-parser.ts

import { errorMessage } from '../errors.js';
import {
  CATEGORIES,
  SEVERITIES,
  type Category,
  type Label,
  type ReviewIssue,
  type ReviewResult,
  type Severity,
} from './review-engine-types.js';

export const PARSE_FAILURE_SUMMARY = 'Error parsing OpenAI response';
export const PARSE_FAILURE_RECOMMENDATION = 'Review the code manually';

export function parseFailureResult(): ReviewResult {
  return {
    issues: [],
    summary: PARSE_FAILURE_SUMMARY,
    overallScore: 0,
    recommendations: [PARSE_FAILURE_RECOMMENDATION],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  return typeof value === 'string' ? value : String(value);
}

function asOptionalText(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Accepts numbers and numbers quoted as strings, such as `"85"`. */
function asOptionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asLineNumber(value: unknown): number | undefined {
  const line = asOptionalNumber(value);
  return line !== undefined && line > 0 ? line : undefined;
}

export function toLabel<T extends string>(raw: string, known: readonly T[]): Label<T> {
  const match = known.find(candidate => candidate === raw);
  return match === undefined ? { known: false, value: raw } : { known: true, value: match };
}

function toIssue(data: Record<string, unknown>): ReviewIssue {
  return {
    severity: toLabel<Severity>(asText(data.severity, 'info'), SEVERITIES),
    category: toLabel<Category>(asText(data.category, 'best_practice'), CATEGORIES),
    title: asText(data.title, ''),
    description: asText(data.description, ''),
    lineNumber: asLineNumber(data.line_number),
    filePath: asOptionalText(data.file_path),
    suggestion: asOptionalText(data.suggestion),
  };
}

/**
 * Pulls the JSON object out of a model answer that may wrap it in prose or
 * code fences. The object is taken from the first `{` to the last `}`, so it
 * has to be the only brace-delimited block in the answer.
 *
 * Never throws: anything unparseable becomes the fixed fallback result.
 */
export function parseReviewResponse(rawResponse: string): ReviewResult {
  const start = rawResponse.indexOf('{');
  const end = rawResponse.lastIndexOf('}');

  if (start === -1 || end === -1 || end < start) {
    console.warn(`⚠️  PARSE FAIL: No JSON object found in response.`);
    console.warn(`RAW RESPONSE SNIPPET: ${rawResponse.substring(0, 500)}`);
    return parseFailureResult();
  }

  const objectContent = rawResponse.substring(start, end + 1);

  let data: unknown;
  try {
    data = JSON.parse(objectContent);
  } catch (error) {
    console.warn(`⚠️  PARSE FAIL: JSON syntax error: ${errorMessage(error)}`);
    console.warn(`Failed String: ${objectContent.substring(0, 500)}...`);
    return parseFailureResult();
  }

  if (!isRecord(data)) {
    console.warn(`⚠️  PARSE FAIL: Extracted JSON is not an object.`);
    return parseFailureResult();
  }

  const issues = Array.isArray(data.issues)
    ? data.issues.filter(isRecord).map(toIssue)
    : [];

  const recommendations = Array.isArray(data.recommendations)
    ? data.recommendations.filter((item): item is string => typeof item === 'string')
    : [];

  return {
    issues,
    summary: asText(data.summary, ''),
    overallScore: asOptionalNumber(data.overall_score) ?? 0,
    recommendations,
  };
}

/**
 * Folds per-file chunk results into one. `results` holds only chunks that
 * produced an answer; `chunkCount` is every chunk that was attempted.
 */
export function mergeChunkResults(results: ReviewResult[], chunkCount: number, maxRecommendations = 5): ReviewResult {
  const issues = results.flatMap(result => result.issues);
  const recommendations = [...new Set(results.flatMap(result => result.recommendations))]
    .slice(0, maxRecommendations);

  const scoreSum = results.reduce((sum, result) => sum + result.overallScore, 0);
  const overallScore = results.length > 0 ? Math.floor(scoreSum / results.length) : 0;

  return {
    issues,
    summary: `Analyzed ${chunkCount} files with ${issues.length} total issues found`,
    overallScore,
    recommendations,
  };
}
