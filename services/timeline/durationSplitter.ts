/**
 * Duration Splitter
 *
 * Partitions one subtitle segment into sub-intervals of roughly
 * `splitSeconds` each, dividing the text among them:
 * - one split when the segment is short
 * - otherwise N = ceil(duration / splitSeconds) equal time slices, the last
 *   one ending exactly at the segment end
 * - text goes by word, then by sentence-like unit, then by word groups
 */

import type { TextSegment, TextSplit, TimeSpan } from '../../types/timeline.js';
import { DEFAULT_SPLIT_SECONDS } from './config.js';
import { InvalidSplitCountError } from './errors.js';
import { extractKeywords, tokenizeText } from './keywordExtractor.js';
import { toMillisecondPrecision } from './timeCodec.js';

export interface SplitterOptions {
  splitSeconds?: number;
  stopwords?: ReadonlySet<string>;
}

// Applied in order; each pass splits every unit produced by the previous one.
const SENTENCE_BOUNDARIES: RegExp[] = [
  /[.!?]+\s+/,
  /,\s+(?:and|or|but|so|yet|for|nor)\s+/,
  /\s+(?:and|or|but|so|yet|for|nor)\s+/,
  /,\s+/,
];

/**
 * Number of splits a segment of this duration calls for, never below 1.
 * Computed on whole milliseconds so float noise in the span cannot add a split.
 */
export function computeSplitCount(durationSeconds: number, splitSeconds: number = DEFAULT_SPLIT_SECONDS): number {
  const durationMillis = Math.round(durationSeconds * 1000);
  const sliceMillis = Math.round(splitSeconds * 1000);
  return Math.max(1, Math.ceil(durationMillis / sliceMillis));
}

/**
 * Split text at sentence ends, then conjunctions after commas, then bare
 * conjunctions, then bare commas.
 */
export function splitIntoSentences(text: string): string[] {
  let units = [text];

  for (const boundary of SENTENCE_BOUNDARIES) {
    units = units.flatMap(unit =>
      unit.split(boundary).map(part => part.trim()).filter(part => part.length > 0)
    );
  }

  return units;
}

/**
 * Distribute items over `count` groups, earlier groups taking the remainder.
 */
export function distributeEvenly<T>(items: readonly T[], count: number): T[][] {
  const base = Math.floor(items.length / count);
  const remainder = items.length % count;
  const groups: T[][] = [];

  let startIdx = 0;
  for (let i = 0; i < count; i++) {
    const size = base + (i < remainder ? 1 : 0);
    groups.push(items.slice(startIdx, startIdx + size));
    startIdx += size;
  }

  return groups;
}

/**
 * Divide text into content chunks for `count` splits.
 * May return fewer chunks than requested when the text has fewer words.
 */
export function splitTextIntoChunks(text: string, count: number): string[] {
  if (count <= 1) {
    return [text];
  }

  const words = tokenizeText(text);
  if (words.length <= count) {
    return words;
  }

  const sentences = splitIntoSentences(text);
  if (sentences.length >= count) {
    return distributeEvenly(sentences, count).map(group => group.join(' '));
  }

  return distributeEvenly(words, count).map(group => group.join(' '));
}

/**
 * `count` contiguous sub-spans of equal length. Inner boundaries are snapped
 * to whole milliseconds; the outer ones are the span's own.
 */
export function divideSpan(span: TimeSpan, count: number): TimeSpan[] {
  const step = (span.endSeconds - span.startSeconds) / count;
  const boundaries: number[] = [span.startSeconds];

  for (let i = 1; i < count; i++) {
    boundaries.push(toMillisecondPrecision(span.startSeconds + i * step));
  }
  boundaries.push(span.endSeconds);

  const spans: TimeSpan[] = [];
  for (let i = 0; i < count; i++) {
    spans.push({ startSeconds: boundaries[i], endSeconds: boundaries[i + 1] });
  }
  return spans;
}

/**
 * Split one segment. The result tiles the segment's span exactly.
 */
export function splitSegment(segment: TextSegment, options: SplitterOptions = {}): TextSplit[] {
  const { splitSeconds = DEFAULT_SPLIT_SECONDS, stopwords } = options;
  const { span, segmentIndex } = segment;

  const splitCount = computeSplitCount(span.endSeconds - span.startSeconds, splitSeconds);
  if (!Number.isInteger(splitCount) || splitCount <= 0) {
    throw new InvalidSplitCountError(splitCount, segmentIndex);
  }

  const chunks = splitCount <= 1 ? [segment.text] : splitTextIntoChunks(segment.text, splitCount);

  // No words at all: keep the whole segment as one (empty) split
  if (chunks.length === 0) {
    return [makeSplit(segment.text, span, segmentIndex, 0, stopwords)];
  }

  const spans = divideSpan(span, chunks.length);
  return chunks.map((chunk, i) => makeSplit(chunk, spans[i], segmentIndex, i, stopwords));
}

function makeSplit(
  text: string,
  span: TimeSpan,
  segmentIndex: number,
  splitIndex: number,
  stopwords?: ReadonlySet<string>
): TextSplit {
  return {
    text: text.trim(),
    span,
    keywords: extractKeywords(text, stopwords),
    segmentIndex,
    splitIndex,
  };
}
