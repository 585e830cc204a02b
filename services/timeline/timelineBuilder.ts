/**
 * Timeline Builder
 *
 * Runs the whole engine in pass order:
 * split → assemble entries → materialize → resolve → quantize/bridge → serialize.
 * Each build is a pure function of its segments and image assignments.
 */

import type {
  ImageAssignmentInput,
  ImageAssignments,
  TextSegment,
  TextSplit,
  TimelineEntry,
  TimelineJsonEntry,
} from '../../types/timeline.js';
import { timelineLogger } from '../logger.js';
import { DEFAULT_TIMELINE_CONFIG, type TimelineConfig } from './config.js';
import { splitSegment } from './durationSplitter.js';
import { NoSegmentsError } from './errors.js';
import { generateFcpxml, type FcpxmlDocument } from './fcpxmlSerializer.js';
import { createTimeSpan, formatTimestamp, parseTimeSpan, toMillisecondPrecision } from './timeCodec.js';

const log = timelineLogger.child('Builder');

export function splitKey(segmentIndex: number, splitIndex: number): string {
  return `${segmentIndex}:${splitIndex}`;
}

/**
 * Build the (segment, split) → images map. Later inputs for the same split
 * replace earlier ones.
 */
export function buildImageAssignments(inputs: readonly ImageAssignmentInput[]): ImageAssignments {
  const assignments = new Map<string, readonly string[]>();
  for (const input of inputs) {
    assignments.set(splitKey(input.segmentIndex, input.splitIndex), [...input.images]);
  }
  return assignments;
}

export interface SplitSegmentsOptions {
  config?: TimelineConfig;
  stopwords?: ReadonlySet<string>;
}

/**
 * Split every segment, in order. Throws NoSegmentsError on empty input.
 */
export function splitSegments(segments: readonly TextSegment[], options: SplitSegmentsOptions = {}): TextSplit[] {
  if (segments.length === 0) {
    throw new NoSegmentsError();
  }

  const { config = DEFAULT_TIMELINE_CONFIG, stopwords } = options;
  const splits = segments.flatMap(segment =>
    splitSegment(segment, { splitSeconds: config.splitSeconds, stopwords })
  );

  log.debug(`Split ${segments.length} segments into ${splits.length} splits`);
  return splits;
}

/**
 * One entry per split, in split order. Spans are held at millisecond
 * precision so the JSON timeline and the XML see the same times.
 */
export function assembleTimeline(splits: readonly TextSplit[], assignments: ImageAssignments = new Map()): TimelineEntry[] {
  return splits.map(split => ({
    span: {
      startSeconds: toMillisecondPrecision(split.span.startSeconds),
      endSeconds: toMillisecondPrecision(split.span.endSeconds),
    },
    imagePaths: [...(assignments.get(splitKey(split.segmentIndex, split.splitIndex)) ?? [])],
  }));
}

export function toTimelineJson(entries: readonly TimelineEntry[]): TimelineJsonEntry[] {
  return entries.map(entry => ({
    start: formatTimestamp(entry.span.startSeconds),
    end: formatTimestamp(entry.span.endSeconds),
    image: [...entry.imagePaths],
  }));
}

/**
 * Read entries back from the JSON timeline format.
 */
export function fromTimelineJson(json: readonly TimelineJsonEntry[]): TimelineEntry[] {
  return json.map(item => ({
    span: parseTimeSpan(item.start, item.end),
    imagePaths: [...item.image],
  }));
}

export function renderTimelineJson(entries: readonly TimelineEntry[]): string {
  return JSON.stringify(toTimelineJson(entries), null, 2);
}

export interface TextSegmentInput {
  text: string;
  start: string;
  end: string;
}

/**
 * Parse `{text, start, end}` triples into indexed segments.
 */
export function createSegments(inputs: readonly TextSegmentInput[]): TextSegment[] {
  return inputs.map((input, segmentIndex) => ({
    text: input.text,
    span: parseTimeSpan(input.start, input.end),
    segmentIndex,
  }));
}

export function createSegment(text: string, startSeconds: number, endSeconds: number, segmentIndex: number): TextSegment {
  return { text, span: createTimeSpan(startSeconds, endSeconds), segmentIndex };
}

export interface BuildTimelineOptions extends SplitSegmentsOptions {
  title: string;
}

export interface TimelineBuild {
  splits: TextSplit[];
  entries: TimelineEntry[];
  timeline: TimelineJsonEntry[];
  fcpxml: FcpxmlDocument;
}

/**
 * Full build from parsed segments and image assignments.
 */
export function buildTimeline(
  segments: readonly TextSegment[],
  assignments: ImageAssignments,
  options: BuildTimelineOptions
): TimelineBuild {
  const { title, config = DEFAULT_TIMELINE_CONFIG, stopwords } = options;

  const splits = splitSegments(segments, { config, stopwords });
  const entries = assembleTimeline(splits, assignments);
  const fcpxml = generateFcpxml(entries, title, config);

  log.info(`Built timeline "${title}": ${entries.length} entries, ${fcpxml.assets.length} assets`);
  return { splits, entries, timeline: toTimelineJson(entries), fcpxml };
}
