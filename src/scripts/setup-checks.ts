// src/scripts/setup-checks.ts

import { ConfigLoader } from '../config/config-loader.js';
import { errorMessage } from '../errors.js';
import { GitHubClient } from '../github/github-client.js';

export interface SetupCheck {
  name: string;
  /** Resolves with a detail line on success; throws to fail the check. */
  run: () => Promise<string | void>;
}

export interface SetupReport {
  passed: number;
  total: number;
}

const RUNTIME_MODULES = ['@octokit/rest', 'chalk', 'dotenv', 'yaml'];

export function defaultChecks(loader: ConfigLoader): SetupCheck[] {
  return [
    {
      name: 'Module Imports',
      run: async () => {
        for (const name of RUNTIME_MODULES) {
          await import(name);
        }
        return `Loaded ${RUNTIME_MODULES.join(', ')}`;
      },
    },
    {
      name: 'Environment Variables',
      run: async () => {
        const missing = loader.getMissingEnvVars();
        if (missing.length > 0) {
          throw new Error(`Missing: ${missing.join(', ')}`);
        }
        return `Found ${loader.getRequiredEnvVars().join(', ')}`;
      },
    },
    {
      name: 'GitHub API',
      run: async () => {
        const config = loader.resolve();
        const login = await new GitHubClient(config.githubToken).getAuthenticatedLogin();
        return `Authenticated as ${login}`;
      },
    },
    {
      name: 'LLM API',
      run: async () => {
        const config = loader.resolve();
        const llm = loader.createProvider(config);
        const reply = await llm.complete({
          model: config.models.smokeTest,
          messages: [{ role: 'user', content: "Say 'Hello, World!'" }],
          maxOutputTokens: 10,
          temperature: 0,
        });
        if (!reply) {
          throw new Error(`${llm.name} returned an empty response`);
        }
        return `${llm.name} replied: ${reply.trim()}`;
      },
    },
  ];
}

/** Runs every check in order; a failing check does not stop the ones after it. */
export async function runSetupChecks(checks: SetupCheck[]): Promise<SetupReport> {
  let passed = 0;

  for (const check of checks) {
    console.log(`\n🔎 ${check.name}...`);
    try {
      const detail = await check.run();
      console.log(`✅ ${check.name}${detail ? `: ${detail}` : ''}`);
      passed++;
    } catch (error) {
      console.log(`❌ ${check.name}: ${errorMessage(error)}`);
    }
  }

  console.log(`\n📊 Test Results: ${passed}/${checks.length}`);
  return { passed, total: checks.length };
}
