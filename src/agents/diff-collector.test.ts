import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CONFIG } from '../config/config-loader.js';
import { addedLines } from '../testing/fakes.js';
import { collectDiff, isReviewable, renderDiffBlob } from './diff-collector.js';

const settings = DEFAULT_CONFIG.diff;

void describe('collectDiff', async () => {
  await it('renders a full file with its header', () => {
    const { entries } = collectDiff(
      [{ filename: 'src/a.ts', status: 'modified', additions: 2, deletions: 1, patch: '+x\n+y\n-z' }],
      settings
    );

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0].kind, 'full');
    assert.strictEqual(
      entries[0].segment,
      'File: src/a.ts\nStatus: modified\nAdditions: 2, Deletions: 1\n---\n+x\n+y\n-z\n\n'
    );
  });

  await it('keeps a file with exactly 1000 changes whole', () => {
    const patch = addedLines(600);
    const { entries } = collectDiff(
      [{ filename: 'big.ts', status: 'modified', additions: 600, deletions: 400, patch }],
      settings
    );

    assert.strictEqual(entries[0].kind, 'full');
    assert.ok(entries[0].segment.endsWith(`${patch}\n\n`));
  });

  await it('truncates a file with 1001 changes to its first 500 lines', () => {
    const { entries } = collectDiff(
      [{ filename: 'big.ts', status: 'modified', additions: 601, deletions: 400, patch: addedLines(600) }],
      settings
    );

    const [entry] = entries;
    assert.strictEqual(entry.kind, 'truncated');
    assert.ok(entry.segment.startsWith('File: big.ts\nStatus: modified\nAdditions: 601, Deletions: 400\n---\n+line 0\n'));
    assert.ok(entry.segment.endsWith('+line 499\n... (truncated due to size)\n\n'));
    assert.ok(!entry.segment.includes('+line 500'));
  });

  await it('skips binary files by extension, ignoring case', () => {
    const { entries, stats } = collectDiff(
      [
        { filename: 'image.png', status: 'added', additions: 0, deletions: 0, patch: 'Binary' },
        { filename: 'docs/LOGO.PNG', status: 'added', additions: 0, deletions: 0, patch: 'Binary' },
      ],
      settings
    );

    assert.deepStrictEqual(entries.map(e => e.segment), [
      'File: image.png (binary file - skipped)\n',
      'File: docs/LOGO.PNG (binary file - skipped)\n',
    ]);
    assert.ok(entries.every(e => e.kind === 'skipped' && e.reason === 'binary'));
    assert.deepStrictEqual(stats, { processedFiles: 0, totalChanges: 0 });
  });

  await it('marks files without a patch as skipped', () => {
    const { entries } = collectDiff(
      [{ filename: 'moved.ts', status: 'renamed', additions: 0, deletions: 0 }],
      settings
    );

    assert.strictEqual(entries[0].segment, 'File: moved.ts (no patch available - skipped)\n');
    assert.strictEqual(isReviewable(entries[0]), false);
  });

  await it('counts processed files and changes, keeping listing order', () => {
    const { entries, stats } = collectDiff(
      [
        { filename: 'a.ts', status: 'modified', additions: 3, deletions: 2, patch: '+a' },
        { filename: 'logo.png', status: 'added', additions: 0, deletions: 0, patch: 'Binary' },
        { filename: 'b.ts', status: 'added', additions: 10, deletions: 0, patch: '+b' },
      ],
      settings
    );

    assert.deepStrictEqual(entries.map(e => e.filename), ['a.ts', 'logo.png', 'b.ts']);
    assert.deepStrictEqual(stats, { processedFiles: 2, totalChanges: 15 });
    assert.strictEqual(renderDiffBlob(entries), entries.map(e => e.segment).join(''));
  });
});
