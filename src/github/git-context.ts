// src/github/git-context.ts
// Reads repository and branch from the local checkout for the description tool.

import { execFileSync } from 'node:child_process';

function runGit(args: string[], cwd?: string): string | null {
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf8',
      timeout: 10000,
      stdio: ['ignore', 'pipe', 'pipe'],
    }).trim();
  } catch {
    // not a git checkout, no such remote, or git missing
    return null;
  }
}

/**
 * `https://github.com/owner/repo(.git)`, `git@github.com:owner/repo(.git)`
 * and `ssh://git@github.com/owner/repo(.git)` all map to `owner/repo`.
 */
export function parseRepoFromRemoteUrl(remoteUrl: string): string | null {
  const match = remoteUrl
    .trim()
    .match(/^(?:https:\/\/(?:[^@/]+@)?github\.com\/|git@github\.com:|ssh:\/\/git@github\.com\/)([^/]+\/[^/]+?)(?:\.git)?\/?$/);
  return match ? match[1] : null;
}

export function getRepoFromRemote(cwd?: string): string | null {
  const remoteUrl = runGit(['remote', 'get-url', 'origin'], cwd);
  return remoteUrl ? parseRepoFromRemoteUrl(remoteUrl) : null;
}

/** null on a detached HEAD or outside a checkout. */
export function getCurrentBranch(cwd?: string): string | null {
  const branch = runGit(['branch', '--show-current'], cwd);
  return branch ? branch : null;
}
