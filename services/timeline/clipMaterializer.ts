/**
 * Clip Materializer
 *
 * Registers one asset per distinct image and turns every timeline entry
 * with k images into k equal, consecutive clips.
 */

import type { AssetResource, Clip, TimelineEntry } from '../../types/timeline.js';
import { timelineLogger } from '../logger.js';
import { isTimelineError } from './errors.js';
import { mediaName, toMediaUrl } from './mediaReference.js';

const log = timelineLogger.child('Materializer');

export interface AssetRegistry {
  /** In first-seen order */
  assets: AssetResource[];
  byPath: ReadonlyMap<string, AssetResource>;
  /** Image paths that could not become a file reference */
  omitted: string[];
}

/**
 * Assign `r1`, `r2`, ... to distinct image paths in first-encounter order.
 * Paths that cannot be referenced are logged, reported in `omitted` and
 * take no id.
 */
export function collectAssets(entries: readonly TimelineEntry[]): AssetRegistry {
  const byPath = new Map<string, AssetResource>();
  const omitted: string[] = [];
  const rejected = new Set<string>();

  for (const entry of entries) {
    for (const imagePath of entry.imagePaths) {
      if (byPath.has(imagePath) || rejected.has(imagePath)) continue;

      try {
        const mediaUrl = toMediaUrl(imagePath);
        byPath.set(imagePath, {
          assetId: `r${byPath.size + 1}`,
          imagePath,
          name: mediaName(imagePath),
          mediaUrl,
        });
      } catch (error) {
        if (!isTimelineError(error)) throw error;
        log.warn(`Omitting asset: ${error.message}`);
        rejected.add(imagePath);
        omitted.push(imagePath);
      }
    }
  }

  return { assets: [...byPath.values()], byPath, omitted };
}

/**
 * Divide each entry's span evenly among its images, in image order.
 * The last clip of an entry ends exactly at the entry's end.
 * Images missing from the registry produce no clip.
 */
export function materializeClips(entries: readonly TimelineEntry[], registry: AssetRegistry): Clip[] {
  const clips: Clip[] = [];

  for (const entry of entries) {
    const count = entry.imagePaths.length;
    if (count === 0) continue;

    const { startSeconds, endSeconds } = entry.span;
    const imageDuration = (endSeconds - startSeconds) / count;

    entry.imagePaths.forEach((imagePath, idx) => {
      const asset = registry.byPath.get(imagePath);
      if (!asset) return;

      const clipStart = startSeconds + idx * imageDuration;
      const clipEnd = idx === count - 1 ? endSeconds : clipStart + imageDuration;
      clips.push({
        span: { startSeconds: clipStart, endSeconds: clipEnd },
        imagePath,
        assetId: asset.assetId,
      });
    });
  }

  return clips;
}
