#!/usr/bin/env node
// src/scripts/check-setup.ts
// Verifies credentials and connectivity before the first real review.

import { ConfigLoader } from '../config/config-loader.js';
import { defaultChecks, runSetupChecks } from './setup-checks.js';

console.log('🧪 PR review setup check');
console.log('='.repeat(50));

const report = await runSetupChecks(defaultChecks(new ConfigLoader()));

if (report.passed === report.total) {
  console.log('🎉 All checks passed. Ready to review.');
} else {
  console.log('⚠️  Some checks failed. Fix the issues above before running a review.');
  process.exitCode = 1;
}
