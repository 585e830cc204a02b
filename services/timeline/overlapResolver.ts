/**
 * Overlap Resolver
 *
 * Sweep over clips ordered by end time. A clip starting before the last
 * kept clip ends is trimmed to start there; a clip trimmed to nothing is
 * dropped. The result is ordered and pairwise non-overlapping.
 */

import type { Clip } from '../../types/timeline.js';

/**
 * Resolve overlaps globally. Input clips are not mutated; trimmed clips are
 * copies with a new span.
 */
export function resolveOverlaps(clips: readonly Clip[]): Clip[] {
  // Array.prototype.sort is stable: equal ends keep input order
  const sorted = [...clips].sort((a, b) => a.span.endSeconds - b.span.endSeconds);

  const kept: Clip[] = [];
  let lastKept: Clip | null = null;

  for (const clip of sorted) {
    let candidate: Clip | null = clip;

    if (lastKept !== null && clip.span.startSeconds < lastKept.span.endSeconds) {
      const startSeconds = Math.max(clip.span.startSeconds, lastKept.span.endSeconds);
      candidate = startSeconds >= clip.span.endSeconds
        ? null
        : { ...clip, span: { startSeconds, endSeconds: clip.span.endSeconds } };
    }

    if (candidate !== null) {
      kept.push(candidate);
      lastKept = candidate;
    }
  }

  return kept;
}
