// src/agents/description-engine.ts

import type { ReviewConfig } from '../config/config-loader.js';
import { ConfigError, UpstreamError, errorMessage } from '../errors.js';
import type { LLMProvider } from '../providers/index.js';
import { buildDescriptionPrompt, DESCRIPTION_SYSTEM_PROMPT } from './prompt-builder.js';
import type { PullRequestSnapshot, PullRequestSource } from './review-engine-types.js';

export class DescriptionEngine {
  constructor(
    private llm: LLMProvider,
    private config: ReviewConfig,
    private source: PullRequestSource
  ) {}

  /**
   * Resolves the PR to describe: `prNumber` when given, otherwise the open PR
   * whose head branch is `currentBranch`.
   */
  async resolvePullRequestNumber(repo: string, prNumber?: number, currentBranch?: string | null): Promise<number> {
    if (prNumber !== undefined) {
      return prNumber;
    }
    if (!currentBranch) {
      throw new ConfigError('Could not determine current branch. Please specify the PR with --pr.');
    }

    const found = await this.source.findOpenPullRequestForBranch(repo, currentBranch);
    if (found === undefined) {
      throw new ConfigError(`No open PR found for branch: ${currentBranch}`);
    }
    console.log(`✓ Found PR #${found} for branch ${currentBranch}`);
    return found;
  }

  async collectInfo(repo: string, prNumber: number): Promise<PullRequestSnapshot> {
    const summary = await this.source.getPullRequest(repo, prNumber);
    const files = await this.source.listChangedFiles(repo, prNumber);
    const commits = await this.source.listCommitMessages(repo, prNumber);
    return { ...summary, files, commits };
  }

  async generateDescription(info: PullRequestSnapshot): Promise<string> {
    const { description } = this.config;
    const prompt = buildDescriptionPrompt(this.config.prompts.description, info, description.recentCommits);

    let content: string | null;
    try {
      content = await this.llm.complete({
        model: this.config.models.description,
        messages: [
          { role: 'system', content: DESCRIPTION_SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        maxOutputTokens: description.maxOutputTokens,
        temperature: description.temperature,
      });
    } catch (error) {
      throw new UpstreamError(`${this.llm.name} API error: ${errorMessage(error)}`, { cause: error });
    }

    const text = content?.trim();
    if (!text) {
      throw new UpstreamError('Failed to generate description');
    }
    return text;
  }
}
