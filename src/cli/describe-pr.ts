#!/usr/bin/env node
// src/cli/describe-pr.ts

import chalk from 'chalk';
import { DescriptionEngine } from '../agents/description-engine.js';
import { ConfigLoader } from '../config/config-loader.js';
import { ConfigError } from '../errors.js';
import { getCurrentBranch, getRepoFromRemote } from '../github/git-context.js';
import { GitHubClient } from '../github/github-client.js';
import { DESCRIBE_USAGE, parseDescribeArgs } from './args.js';
import { runCommand } from './run.js';

async function main(): Promise<void> {
  const args = parseDescribeArgs(process.argv.slice(2));
  if (args.help) {
    console.log(DESCRIBE_USAGE);
    return;
  }

  const loader = new ConfigLoader();
  const config = loader.resolve({ githubToken: args.token });

  const repo = args.repo ?? getRepoFromRemote();
  if (!repo) {
    throw new ConfigError('Could not determine repository from git remote. Please specify it with --repo.');
  }
  console.log(`✓ Repository: ${repo}`);

  const github = new GitHubClient(config.githubToken);
  const engine = new DescriptionEngine(loader.createProvider(config), config, github);

  const prNumber = await engine.resolvePullRequestNumber(
    repo,
    args.prNumber,
    args.prNumber === undefined ? getCurrentBranch() : null
  );

  console.log(`📡 Collecting information for PR #${prNumber}...`);
  const info = await engine.collectInfo(repo, prNumber);
  console.log(`✓ PR: "${info.title}" (${info.files.length} files, ${info.commits.length} commits)`);

  console.log('🧠 Generating description...');
  const description = await engine.generateDescription(info);

  console.log('');
  console.log(chalk.bold.blue(`📝 Generated description for PR #${prNumber}`));
  console.log(chalk.blue('─'.repeat(60)));
  console.log(description);
  console.log(chalk.blue('─'.repeat(60)));
}

await runCommand('Description generation cancelled by user.', main);
