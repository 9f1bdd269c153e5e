#!/usr/bin/env node
// src/cli/review-pr.ts

import chalk from 'chalk';
import { ReviewEngine } from '../agents/review-engine.js';
import { ConfigLoader } from '../config/config-loader.js';
import { ConfigError } from '../errors.js';
import { GitHubClient } from '../github/github-client.js';
import { buildReviewExport, displayReview, saveReviewExport } from '../report/review-reporter.js';
import { parseReviewArgs, REVIEW_USAGE } from './args.js';
import { runCommand } from './run.js';

async function main(): Promise<void> {
  const args = parseReviewArgs(process.argv.slice(2));
  if (args.help) {
    console.log(REVIEW_USAGE);
    return;
  }
  if (!args.repo || args.prNumber === undefined) {
    throw new ConfigError(`--repo and --pr are required.\n\n${REVIEW_USAGE}`);
  }

  const loader = new ConfigLoader();
  const config = loader.resolve({ githubToken: args.token, model: args.model });
  const llm = loader.createProvider(config);
  const github = new GitHubClient(config.githubToken);
  const engine = new ReviewEngine(llm, config, github);

  const outcome = await engine.reviewPR(args.repo, args.prNumber, { forceChunked: args.chunk });
  if (!outcome.result) {
    return;
  }

  displayReview(outcome.result, {
    prNumber: args.prNumber,
    title: outcome.pr.title,
    repo: args.repo,
  });

  if (args.output) {
    await saveReviewExport(args.output, buildReviewExport(outcome.result, args.prNumber, args.repo));
    console.log(chalk.green(`✓ Review saved to ${args.output}`));
  }
}

await runCommand('Review cancelled by user.', main);
