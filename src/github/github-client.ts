// src/github/github-client.ts

import { Octokit } from '@octokit/rest';
import { ConfigError, UpstreamError, errorMessage } from '../errors.js';
import type {
  ChangedFile,
  PullRequestSource,
  PullRequestSummary,
} from '../agents/review-engine-types.js';

export interface GitHubClientOptions {
  /** Replaces the fetch implementation Octokit uses for every request. */
  fetch?: typeof fetch;
  baseUrl?: string;
}

export function splitRepoName(fullName: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = fullName.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`Invalid repository name: "${fullName}" (expected "owner/repo")`);
  }
  return { owner, repo };
}

export class GitHubClient implements PullRequestSource {
  private octokit: Octokit;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.octokit = new Octokit({
      auth: token,
      userAgent: 'pr-lens',
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    });
  }

  async getPullRequest(repoName: string, prNumber: number): Promise<PullRequestSummary> {
    const { owner, repo } = splitRepoName(repoName);
    try {
      const { data: pr } = await this.octokit.pulls.get({ owner, repo, pull_number: prNumber });
      return {
        number: pr.number,
        repo: pr.base.repo.full_name,
        title: pr.title,
        body: pr.body ?? '',
        headBranch: pr.head.ref,
        baseBranch: pr.base.ref,
        additions: pr.additions,
        deletions: pr.deletions,
      };
    } catch (error) {
      throw new UpstreamError(`Error fetching PR #${prNumber} from ${repoName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listChangedFiles(repoName: string, prNumber: number): Promise<ChangedFile[]> {
    const { owner, repo } = splitRepoName(repoName);
    try {
      const files = await this.octokit.paginate(this.octokit.pulls.listFiles, {
        owner,
        repo,
        pull_number: prNumber,
        per_page: 100,
      });
      return files.map(f => ({
        filename: f.filename,
        status: f.status,
        additions: f.additions,
        deletions: f.deletions,
        patch: f.patch,
      }));
    } catch (error) {
      throw new UpstreamError(`Error fetching PR diff: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listCommitMessages(repoName: string, prNumber: number): Promise<string[]> {
    const { owner, repo } = splitRepoName(repoName);
    try {
      const commits = await this.octokit.paginate(this.octokit.pulls.listCommits, {
        owner,
        repo,
        pull_number: prNumber,
        per_page: 100,
      });
      return commits.map(c => c.commit.message);
    } catch (error) {
      throw new UpstreamError(`Error fetching PR commits: ${errorMessage(error)}`, { cause: error });
    }
  }

  async findOpenPullRequestForBranch(repoName: string, branch: string): Promise<number | undefined> {
    const { owner, repo } = splitRepoName(repoName);
    try {
      const pulls = await this.octokit.paginate(this.octokit.pulls.list, {
        owner,
        repo,
        state: 'open',
        per_page: 100,
      });
      return pulls.find(pull => pull.head.ref === branch)?.number;
    } catch (error) {
      throw new UpstreamError(`GitHub API error: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getAuthenticatedLogin(): Promise<string> {
    try {
      const { data } = await this.octokit.users.getAuthenticated();
      return data.login;
    } catch (error) {
      throw new UpstreamError(`GitHub authentication failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
