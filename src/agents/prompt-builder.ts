// src/agents/prompt-builder.ts

import type { PullRequestSnapshot } from './review-engine-types.js';

export const REVIEW_SYSTEM_PROMPT =
  'You are an expert code reviewer and security analyst. Analyze the provided code diff and identify issues in the following categories: ' +
  'security vulnerabilities, code smells, performance issues, readability problems, and maintainability concerns. ' +
  'Provide specific, actionable feedback.';

export const CHUNK_SYSTEM_PROMPT =
  'You are an expert code reviewer. Analyze this code chunk and identify issues. Focus on the most critical problems.';

export const DESCRIPTION_SYSTEM_PROMPT =
  'You are a senior software engineer who writes clear, concise, and professional pull request descriptions. ' +
  'Focus on the technical changes and their impact.';

/**
 * Replaces `[KEY]` placeholders in one pass. Unknown placeholders are left
 * alone, and substituted text is never scanned again, so a diff containing
 * `[PR_TITLE]` stays as written.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\[([A-Z_]+)\]/g, (placeholder, key: string) =>
    Object.hasOwn(values, key) ? values[key] : placeholder
  );
}

export function buildReviewPrompt(template: string, pr: { title: string; body: string }, diff: string): string {
  return fillTemplate(template, {
    PR_TITLE: pr.title,
    PR_BODY: pr.body,
    DIFF: diff,
  });
}

export function buildChunkPrompt(template: string, filename: string, chunk: string, prTitle: string): string {
  return fillTemplate(template, {
    FILENAME: filename,
    PR_TITLE: prTitle,
    CHUNK: chunk,
  });
}

export function buildDescriptionPrompt(template: string, info: PullRequestSnapshot, recentCommits: number): string {
  return fillTemplate(template, {
    PR_TITLE: info.title,
    FILES_CHANGED: info.files.map(f => f.filename).join(', '),
    ADDITIONS: String(info.additions),
    DELETIONS: String(info.deletions),
    HEAD_BRANCH: info.headBranch,
    BASE_BRANCH: info.baseBranch,
    COMMIT_COUNT: String(info.commits.length),
    RECENT_COMMITS: info.commits.slice(-recentCommits).join('\n'),
    PR_BODY: info.body || 'No description provided',
  });
}
