// src/agents/review-engine-types.ts

export interface ChangedFile {
  filename: string;
  /** added | modified | removed | renamed, or whatever else the API reports */
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}

export interface PullRequestSummary {
  number: number;
  /** owner/repo */
  repo: string;
  title: string;
  /** Empty when the author left no description. */
  body: string;
  headBranch: string;
  baseBranch: string;
  additions: number;
  deletions: number;
}

export interface PullRequestSnapshot extends PullRequestSummary {
  files: ChangedFile[];
  commits: string[];
}

/** The slice of the hosting API the review and description flows read from. */
export interface PullRequestSource {
  getPullRequest(repo: string, prNumber: number): Promise<PullRequestSummary>;
  listChangedFiles(repo: string, prNumber: number): Promise<ChangedFile[]>;
  listCommitMessages(repo: string, prNumber: number): Promise<string[]>;
  findOpenPullRequestForBranch(repo: string, branch: string): Promise<number | undefined>;
}

export type SkipReason = 'binary' | 'no-patch';

export type DiffEntry =
  | (ChangedFile & { kind: 'full' | 'truncated'; segment: string })
  | (ChangedFile & { kind: 'skipped'; reason: SkipReason; segment: string });

export interface CollectStats {
  processedFiles: number;
  totalChanges: number;
}

export interface CollectedDiff {
  entries: DiffEntry[];
  stats: CollectStats;
}

export interface DiffSegment {
  filename: string;
  text: string;
}

export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const CATEGORIES = ['security', 'performance', 'readability', 'maintainability', 'best_practice'] as const;
export type Category = (typeof CATEGORIES)[number];

/**
 * A label from a closed set. Values the model invents are kept verbatim
 * under `known: false` so they can still be displayed and exported.
 */
export type Label<T extends string> =
  | { known: true; value: T }
  | { known: false; value: string };

export interface ReviewIssue {
  severity: Label<Severity>;
  category: Label<Category>;
  title: string;
  description: string;
  lineNumber?: number;
  filePath?: string;
  suggestion?: string;
}

export interface ReviewResult {
  issues: ReviewIssue[];
  summary: string;
  /** Nominally 0-100. Passed through from the model without clamping. */
  overallScore: number;
  recommendations: string[];
}
