/**
 * SRT Parser
 *
 * Turns SubRip subtitle content into indexed TextSegments. Malformed cues
 * are skipped and reported; they never abort the whole file.
 */

import fs from 'fs/promises';
import type { TextSegment } from '../types/timeline.js';
import { createLogger } from '../services/logger.js';
import { isTimelineError } from '../services/timeline/errors.js';
import { parseTimeSpan, parseTimestamp } from '../services/timeline/timeCodec.js';

const log = createLogger('SrtParser');

const TIMING_LINE = /^(\S+)\s*-->\s*(\S+)/;

export interface SkippedBlock {
  /** 0-based block position in the file */
  blockIndex: number;
  reason: string;
}

export interface SrtParseResult {
  segments: TextSegment[];
  skipped: SkippedBlock[];
}

/**
 * Parse an SRT timestamp into seconds, or null when it is malformed.
 */
export function parseSRTTimestamp(timestamp: string): number | null {
  try {
    return parseTimestamp(timestamp);
  } catch (error) {
    if (isTimelineError(error)) return null;
    throw error;
  }
}

export function parseSrt(content: string): SrtParseResult {
  const normalized = content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();

  const segments: TextSegment[] = [];
  const skipped: SkippedBlock[] = [];
  if (!normalized) return { segments, skipped };

  const blocks = normalized.split(/\n\s*\n/);

  blocks.forEach((block, blockIndex) => {
    const skip = (reason: string) => {
      log.warn(`Skipping malformed subtitle block ${blockIndex + 1}: ${reason}`);
      skipped.push({ blockIndex, reason });
    };

    const lines = block.trim().split('\n');
    if (lines.length < 3) {
      skip('expected index, timing and text lines');
      return;
    }

    const [indexLine = '', timingLine = ''] = lines;
    if (!/^\d+$/.test(indexLine.trim())) {
      skip(`invalid index "${indexLine.trim()}"`);
      return;
    }

    const timing = TIMING_LINE.exec(timingLine.trim());
    if (!timing) {
      skip(`invalid timing line "${timingLine.trim()}"`);
      return;
    }

    try {
      const span = parseTimeSpan(timing[1] ?? '', timing[2] ?? '');
      segments.push({
        text: lines.slice(2).join('\n').trim(),
        span,
        segmentIndex: segments.length,
        cueNumber: parseInt(indexLine.trim(), 10),
      });
    } catch (error) {
      if (!isTimelineError(error)) throw error;
      skip(error.message);
    }
  });

  return { segments, skipped };
}

export async function readSrtFile(srtPath: string): Promise<SrtParseResult> {
  let content: string;
  try {
    content = await fs.readFile(srtPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`SRT file not found or unreadable: ${srtPath} (${reason})`);
  }
  return parseSrt(content);
}
