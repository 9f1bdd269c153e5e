// src/cli/args.ts

import { ConfigError } from '../errors.js';

export interface ReviewArgs {
  repo?: string;
  prNumber?: number;
  token?: string;
  output?: string;
  chunk: boolean;
  model: string;
  help: boolean;
}

export interface DescribeArgs {
  repo?: string;
  prNumber?: number;
  token?: string;
  help: boolean;
}

export const REVIEW_USAGE = `Usage: pr-review --repo <owner/repo> --pr <number> [options]

Options:
  -r, --repo <owner/repo>  Repository to review
  -p, --pr <number>        Pull request number
  -t, --token <token>      GitHub token (defaults to GITHUB_TOKEN)
  -o, --output <file>      Also write the review as JSON to <file>
  -c, --chunk              Review file by file regardless of diff size
  -m, --model <name>       Completion model, or "auto" to pick by diff size (default: auto)
  -h, --help               Show this help`;

export const DESCRIBE_USAGE = `Usage: pr-describe [options]

Options:
  -r, --repo <owner/repo>  Repository (defaults to the origin remote)
  -p, --pr <number>        Pull request number (defaults to the open PR for the current branch)
  -t, --token <token>      GitHub token (defaults to GITHUB_TOKEN)
  -h, --help               Show this help`;

function getFlagValue(args: string[], flag: string, shortFlag: string): string | undefined {
  let idx = args.indexOf(flag);
  if (idx === -1) idx = args.indexOf(shortFlag);
  if (idx === -1) return undefined;

  const value = args[idx + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigError(`Option ${flag} requires a value.`);
  }
  return value;
}

function hasFlag(args: string[], flag: string, shortFlag: string): boolean {
  return args.includes(flag) || args.includes(shortFlag);
}

export function parsePrNumber(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigError(`Invalid PR number: "${value}"`);
  }
  return Number(value);
}

export function parseReviewArgs(args: string[]): ReviewArgs {
  const help = hasFlag(args, '--help', '-h');
  if (help) {
    return { chunk: false, model: 'auto', help };
  }

  const pr = getFlagValue(args, '--pr', '-p');
  return {
    repo: getFlagValue(args, '--repo', '-r'),
    prNumber: pr === undefined ? undefined : parsePrNumber(pr),
    token: getFlagValue(args, '--token', '-t'),
    output: getFlagValue(args, '--output', '-o'),
    chunk: hasFlag(args, '--chunk', '-c'),
    model: getFlagValue(args, '--model', '-m') ?? 'auto',
    help,
  };
}

export function parseDescribeArgs(args: string[]): DescribeArgs {
  const help = hasFlag(args, '--help', '-h');
  if (help) {
    return { help };
  }

  const pr = getFlagValue(args, '--pr', '-p');
  return {
    repo: getFlagValue(args, '--repo', '-r'),
    prNumber: pr === undefined ? undefined : parsePrNumber(pr),
    token: getFlagValue(args, '--token', '-t'),
    help,
  };
}
