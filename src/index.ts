// src/index.ts

export { ReviewEngine } from './agents/review-engine.js';
export type { ReviewOptions, ReviewOutcome } from './agents/review-engine.js';
export { DescriptionEngine } from './agents/description-engine.js';
export { collectDiff, renderDiffBlob, isReviewable, FILE_MARKER, TRUNCATION_MARKER } from './agents/diff-collector.js';
export { splitDiffIntoFiles } from './agents/diff-splitter.js';
export { estimateTokens } from './agents/token-estimator.js';
export { parseReviewResponse, mergeChunkResults, parseFailureResult } from './agents/review-parser.js';
export { fillTemplate, buildReviewPrompt, buildChunkPrompt, buildDescriptionPrompt } from './agents/prompt-builder.js';
export { SEVERITIES, CATEGORIES } from './agents/review-engine-types.js';
export type {
  ChangedFile,
  PullRequestSummary,
  PullRequestSnapshot,
  PullRequestSource,
  SkipReason,
  DiffEntry,
  CollectStats,
  CollectedDiff,
  DiffSegment,
  Severity,
  Category,
  Label,
  ReviewIssue,
  ReviewResult,
} from './agents/review-engine-types.js';
export { ConfigLoader, DEFAULT_CONFIG } from './config/config-loader.js';
export type { ReviewConfig, ConfigOverrides, ConfigLoaderOptions } from './config/config-loader.js';
export { GitHubClient, splitRepoName } from './github/github-client.js';
export { getRepoFromRemote, getCurrentBranch, parseRepoFromRemoteUrl } from './github/git-context.js';
export { renderReview, displayReview, buildReviewExport, saveReviewExport } from './report/review-reporter.js';
export type { ReviewExport, ReviewHeader } from './report/review-reporter.js';
export * from './providers/index.js';
export { ConfigError, UpstreamError } from './errors.js';
