/**
 * Time Codec
 *
 * Converts between subtitle timestamps (`HH:MM:SS,mmm` or `HH:MM:SS.mmm`),
 * seconds, and integer frame counts.
 */

import type { TimeSpan } from '../../types/timeline.js';
import { DEFAULT_FPS } from './config.js';
import { InvalidTimeSpanError, MalformedTimestampError } from './errors.js';

const TIMESTAMP_PATTERN = /^(\d{2}):(\d{2}):(\d{2})(?:[,.](\d{1,3}))?$/;

/**
 * Build seconds from clock parts. Parsing and millisecond snapping both go
 * through here so that equal clock readings give bit-identical seconds.
 */
function composeSeconds(hours: number, minutes: number, seconds: number, millis: number): number {
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

function splitMillis(totalMillis: number): [number, number, number, number] {
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMillis % 60_000) / 1000);
  const millis = totalMillis % 1000;
  return [hours, minutes, seconds, millis];
}

/**
 * Parse `HH:MM:SS,mmm` / `HH:MM:SS.mmm` into seconds.
 * The fraction is decimal (`,5` is 500ms); a missing fraction is 0.
 */
export function parseTimestamp(text: string): number {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    throw new MalformedTimestampError(text);
  }

  const [, hh = '0', mm = '0', ss = '0', fraction = ''] = match;
  const minutes = parseInt(mm, 10);
  const seconds = parseInt(ss, 10);
  if (minutes > 59 || seconds > 59) {
    throw new MalformedTimestampError(text);
  }

  const millis = fraction ? parseInt(fraction.padEnd(3, '0'), 10) : 0;
  return composeSeconds(parseInt(hh, 10), minutes, seconds, millis);
}

/**
 * Format seconds as `HH:MM:SS,mmm`, rounded to the nearest millisecond.
 */
export function formatTimestamp(seconds: number): string {
  const totalMillis = Math.max(0, Math.round(seconds * 1000));
  const [h, m, s, ms] = splitMillis(totalMillis);
  const pad = (num: number, size: number) => num.toString().padStart(size, '0');

  return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(ms, 3)}`;
}

/**
 * Snap seconds to whole milliseconds.
 * `toMillisecondPrecision(x) === parseTimestamp(formatTimestamp(x))` for x >= 0.
 */
export function toMillisecondPrecision(seconds: number): number {
  const totalMillis = Math.max(0, Math.round(seconds * 1000));
  return composeSeconds(...splitMillis(totalMillis));
}

/**
 * Truncating conversion: sub-frame time is discarded, not rounded.
 */
export function secondsToFrame(seconds: number, fps: number = DEFAULT_FPS): number {
  return Math.floor(seconds * fps);
}

/**
 * Rational FCPXML time value, e.g. `48/24s`.
 */
export function framesToRational(frames: number, fps: number = DEFAULT_FPS): string {
  return `${frames}/${fps}s`;
}

export function createTimeSpan(startSeconds: number, endSeconds: number): TimeSpan {
  if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds) || endSeconds <= startSeconds) {
    throw new InvalidTimeSpanError(startSeconds, endSeconds);
  }
  return { startSeconds, endSeconds };
}

export function parseTimeSpan(start: string, end: string): TimeSpan {
  return createTimeSpan(parseTimestamp(start), parseTimestamp(end));
}

export function spanDuration(span: TimeSpan): number {
  return span.endSeconds - span.startSeconds;
}
