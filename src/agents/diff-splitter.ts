// src/agents/diff-splitter.ts

import { FILE_MARKER } from './diff-collector.js';
import type { DiffSegment } from './review-engine-types.js';

/**
 * Re-splits a diff blob into per-file segments on `File: ` header lines.
 * Line endings are kept, so joining the segment texts gives back the blob.
 *
 * A patch line that itself starts with `File: ` opens a spurious segment;
 * the review engine avoids this by working on DiffEntry records instead.
 */
export function splitDiffIntoFiles(blob: string): DiffSegment[] {
  const segments: DiffSegment[] = [];
  let current: DiffSegment | undefined;

  for (const line of blob.split(/(?<=\n)/)) {
    if (line.startsWith(FILE_MARKER)) {
      current = {
        filename: line.slice(FILE_MARKER.length).replace(/\r?\n$/, ''),
        text: line,
      };
      segments.push(current);
    } else if (current) {
      current.text += line;
    }
  }

  return segments;
}
