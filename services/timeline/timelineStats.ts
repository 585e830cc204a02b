/**
 * Statistics and text preview for a built timeline.
 */

import path from 'path';
import type { TextSplit, TimelineEntry } from '../../types/timeline.js';
import { formatTimestamp, spanDuration } from './timeCodec.js';

export interface SplitStatistics {
  totalSplits: number;
  totalDuration: number;
  averageDuration: number;
  totalKeywords: number;
  averageKeywords: number;
}

export interface TimelineSummary {
  totalEntries: number;
  entriesWithImages: number;
  totalImages: number;
  uniqueImages: number;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function computeSplitStatistics(splits: readonly TextSplit[]): SplitStatistics {
  if (splits.length === 0) {
    return { totalSplits: 0, totalDuration: 0, averageDuration: 0, totalKeywords: 0, averageKeywords: 0 };
  }

  const totalDuration = splits.reduce((acc, split) => acc + spanDuration(split.span), 0);
  const totalKeywords = splits.reduce((acc, split) => acc + split.keywords.length, 0);

  return {
    totalSplits: splits.length,
    totalDuration: round2(totalDuration),
    averageDuration: round2(totalDuration / splits.length),
    totalKeywords,
    averageKeywords: round2(totalKeywords / splits.length),
  };
}

export function summarizeTimeline(entries: readonly TimelineEntry[]): TimelineSummary {
  const unique = new Set<string>();
  let entriesWithImages = 0;
  let totalImages = 0;

  for (const entry of entries) {
    if (entry.imagePaths.length > 0) entriesWithImages++;
    totalImages += entry.imagePaths.length;
    entry.imagePaths.forEach(imagePath => unique.add(imagePath));
  }

  return { totalEntries: entries.length, entriesWithImages, totalImages, uniqueImages: unique.size };
}

/**
 * Human-readable lines for the first `maxItems` entries.
 */
export function formatTimelinePreview(entries: readonly TimelineEntry[], maxItems: number = 10): string[] {
  const lines: string[] = [];

  entries.slice(0, maxItems).forEach((entry, i) => {
    const duration = spanDuration(entry.span).toFixed(1);
    lines.push(`Segment ${i + 1}:`);
    lines.push(`  Time: ${formatTimestamp(entry.span.startSeconds)} → ${formatTimestamp(entry.span.endSeconds)} (${duration}s)`);
    lines.push(`  Images: ${entry.imagePaths.length}`);
    for (const imagePath of entry.imagePaths) {
      lines.push(`    - ${path.basename(imagePath)}`);
    }
  });

  if (entries.length > maxItems) {
    lines.push(`... and ${entries.length - maxItems} more segments`);
  }

  return lines;
}
