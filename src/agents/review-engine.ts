// src/agents/review-engine.ts

import type { ReviewConfig } from '../config/config-loader.js';
import { UpstreamError, errorMessage } from '../errors.js';
import type { ChatMessage, LLMProvider } from '../providers/index.js';
import { collectDiff, renderDiffBlob } from './diff-collector.js';
import { buildChunkPrompt, buildReviewPrompt, CHUNK_SYSTEM_PROMPT, REVIEW_SYSTEM_PROMPT } from './prompt-builder.js';
import { mergeChunkResults, parseReviewResponse } from './review-parser.js';
import type {
  CollectedDiff,
  DiffEntry,
  PullRequestSource,
  PullRequestSummary,
  ReviewResult,
} from './review-engine-types.js';
import { estimateTokens } from './token-estimator.js';

export interface ReviewOptions {
  /** Review file by file even when the diff would fit in one request. */
  forceChunked?: boolean;
}

export interface ReviewOutcome {
  pr: PullRequestSummary;
  collected: CollectedDiff;
  /** null when the PR has no changed files. */
  result: ReviewResult | null;
}

export class ReviewEngine {
  constructor(
    private llm: LLMProvider,
    private config: ReviewConfig,
    private source: PullRequestSource
  ) {
    console.log(`🤖 ReviewEngine using: ${this.llm.name}`);
  }

  async reviewPR(repo: string, prNumber: number, options: ReviewOptions = {}): Promise<ReviewOutcome> {
    console.log(`📡 Fetching PR #${prNumber} from ${repo}...`);
    const pr = await this.source.getPullRequest(repo, prNumber);
    console.log(`✓ PR: "${pr.title}" (${pr.headBranch} → ${pr.baseBranch})`);

    console.log(`📡 Fetching PR diff...`);
    const files = await this.source.listChangedFiles(repo, prNumber);
    const collected = collectDiff(files, this.config.diff);

    if (renderDiffBlob(collected.entries).trim().length === 0) {
      console.warn('⚠️  No diff content found. The PR might be empty or only contain binary files.');
      return { pr, collected, result: null };
    }

    const result = await this.analyze(pr, collected.entries, options);
    return { pr, collected, result };
  }

  async analyze(
    pr: Pick<PullRequestSummary, 'title' | 'body'>,
    entries: DiffEntry[],
    options: ReviewOptions = {}
  ): Promise<ReviewResult> {
    const diff = renderDiffBlob(entries);
    const estimatedTokens = estimateTokens(diff);

    if (options.forceChunked) {
      console.log(`📦 Forced chunked analysis requested...`);
      return this.analyzeInChunks(pr, entries);
    }

    if (estimatedTokens > this.config.review.chunkThresholdTokens) {
      console.log(`📦 Large diff detected (${estimatedTokens} estimated tokens), analyzing in chunks...`);
      return this.analyzeInChunks(pr, entries);
    }

    return this.analyzeSingleShot(pr, diff, estimatedTokens);
  }

  selectModel(estimatedTokens: number): string {
    if (this.config.modelOverride) {
      return this.config.modelOverride;
    }
    if (estimatedTokens > this.config.review.largeContextThresholdTokens) {
      console.log(`🔍 Using ${this.config.models.largeContext} for larger context window`);
      return this.config.models.largeContext;
    }
    return this.config.models.default;
  }

  private async analyzeSingleShot(
    pr: Pick<PullRequestSummary, 'title' | 'body'>,
    diff: string,
    estimatedTokens: number
  ): Promise<ReviewResult> {
    const model = this.selectModel(estimatedTokens);
    const messages: ChatMessage[] = [
      { role: 'system', content: REVIEW_SYSTEM_PROMPT },
      { role: 'user', content: buildReviewPrompt(this.config.prompts.review, pr, diff) },
    ];

    console.log(`🧠 Analyzing code with ${this.llm.name} (${model}, ~${estimatedTokens} tokens)...`);

    let content: string | null;
    try {
      content = await this.llm.complete({
        model,
        messages,
        maxOutputTokens: this.config.review.maxOutputTokens,
        temperature: this.config.review.temperature,
      });
    } catch (error) {
      throw new UpstreamError(`Error calling ${this.llm.name} API: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new UpstreamError(`${this.llm.name} returned empty response`);
    }

    console.log(`✓ Got response (${content.length} chars)`);
    return parseReviewResponse(content);
  }

  private async analyzeInChunks(
    pr: Pick<PullRequestSummary, 'title'>,
    entries: DiffEntry[]
  ): Promise<ReviewResult> {
    // Skip placeholders are sent too: one call per file header in the blob.
    const model = this.config.modelOverride ?? this.config.models.default;
    const results: ReviewResult[] = [];

    for (const [i, entry] of entries.entries()) {
      console.log(`\n📦 Analyzing chunk ${i + 1}/${entries.length}: ${entry.filename}`);

      const messages: ChatMessage[] = [
        { role: 'system', content: CHUNK_SYSTEM_PROMPT },
        { role: 'user', content: buildChunkPrompt(this.config.prompts.chunk, entry.filename, entry.segment, pr.title) },
      ];

      try {
        const content = await this.llm.complete({
          model,
          messages,
          maxOutputTokens: this.config.review.chunkMaxOutputTokens,
          temperature: this.config.review.temperature,
        });

        if (!content) {
          console.warn(`⚠️  Empty response for chunk ${entry.filename}, skipping`);
          continue;
        }

        const chunkResult = parseReviewResponse(content);
        console.log(`✓ Found ${chunkResult.issues.length} issue(s) in ${entry.filename}`);
        results.push(chunkResult);
      } catch (error) {
        console.warn(`⚠️  Warning: Error analyzing chunk ${entry.filename}: ${errorMessage(error)}`);
      }
    }

    const merged = mergeChunkResults(results, entries.length, this.config.review.maxRecommendations);
    console.log(`\n✅ Total findings across all chunks: ${merged.issues.length}`);
    return merged;
  }
}
