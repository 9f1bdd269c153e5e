// src/agents/diff-collector.ts

import type { DiffSettings } from '../config/config-loader.js';
import type { ChangedFile, CollectedDiff, DiffEntry } from './review-engine-types.js';

export const FILE_MARKER = 'File: ';
export const TRUNCATION_MARKER = '... (truncated due to size)';

function renderHeader(file: ChangedFile): string {
  return `${FILE_MARKER}${file.filename}\n` +
    `Status: ${file.status}\n` +
    `Additions: ${file.additions}, Deletions: ${file.deletions}\n` +
    `---\n`;
}

function isBinary(filename: string, skipExtensions: string[]): boolean {
  const lower = filename.toLowerCase();
  return skipExtensions.some(ext => lower.endsWith(ext.toLowerCase()));
}

/**
 * Turns the PR's changed files into one DiffEntry each, in listing order.
 * Binary and patch-less files become one-line placeholders; oversized patches
 * are cut to their first `truncatedPatchLines` lines.
 */
export function collectDiff(files: ChangedFile[], settings: DiffSettings): CollectedDiff {
  const entries: DiffEntry[] = [];
  let processedFiles = 0;
  let totalChanges = 0;

  for (const file of files) {
    if (!file.patch) {
      entries.push({ ...file, kind: 'skipped', reason: 'no-patch', segment: `${FILE_MARKER}${file.filename} (no patch available - skipped)\n` });
      continue;
    }

    if (isBinary(file.filename, settings.skipExtensions)) {
      entries.push({ ...file, kind: 'skipped', reason: 'binary', segment: `${FILE_MARKER}${file.filename} (binary file - skipped)\n` });
      continue;
    }

    const changes = file.additions + file.deletions;
    if (changes > settings.maxFileChanges) {
      const head = file.patch.split('\n').slice(0, settings.truncatedPatchLines).join('\n');
      console.log(`✂️  TRUNCATED: ${file.filename} (${changes} changes, showing first ${settings.truncatedPatchLines} lines)`);
      entries.push({ ...file, kind: 'truncated', segment: `${renderHeader(file)}${head}\n${TRUNCATION_MARKER}\n\n` });
    } else {
      entries.push({ ...file, kind: 'full', segment: `${renderHeader(file)}${file.patch}\n\n` });
    }

    processedFiles++;
    totalChanges += changes;
  }

  console.log(`📂 Processed ${processedFiles} files with ${totalChanges} total changes`);

  return { entries, stats: { processedFiles, totalChanges } };
}

export function renderDiffBlob(entries: DiffEntry[]): string {
  return entries.map(entry => entry.segment).join('');
}

export function isReviewable(entry: DiffEntry): boolean {
  return entry.kind !== 'skipped';
}
