/**
 * Timeline Builder Tests
 */

import { describe, it, expect } from 'vitest';
import {
  assembleTimeline,
  buildImageAssignments,
  buildTimeline,
  createSegments,
  fromTimelineJson,
  renderTimelineJson,
  splitKey,
  splitSegments,
  toTimelineJson,
} from '../../../services/timeline/timelineBuilder.js';
import { MalformedTimestampError, NoSegmentsError } from '../../../services/timeline/errors.js';
import type { TextSplit } from '../../../types/timeline.js';

const segments = createSegments([
  { text: 'I like to eat an apple', start: '00:00:00,000', end: '00:00:06,000' },
  { text: 'Good night', start: '00:00:06,000', end: '00:00:08,500' },
]);

describe('image assignments', () => {
  it('keys splits by segment and split index', () => {
    expect(splitKey(2, 1)).toBe('2:1');
  });

  it('lets a later assignment replace an earlier one', () => {
    const assignments = buildImageAssignments([
      { segmentIndex: 0, splitIndex: 1, images: ['/img/old.jpg'] },
      { segmentIndex: 0, splitIndex: 1, images: ['/img/new.jpg'] },
    ]);
    expect(assignments.get('0:1')).toEqual(['/img/new.jpg']);
    expect(assignments.size).toBe(1);
  });
});

describe('createSegments', () => {
  it('indexes segments in order', () => {
    expect(segments.map(segment => [segment.segmentIndex, segment.span])).toEqual([
      [0, { startSeconds: 0, endSeconds: 6 }],
      [1, { startSeconds: 6, endSeconds: 8.5 }],
    ]);
  });

  it('rejects malformed timestamps', () => {
    expect(() => createSegments([{ text: 'x', start: '0:00', end: '00:00:01,000' }])).toThrow(MalformedTimestampError);
  });
});

describe('splitSegments', () => {
  it('fails on empty input', () => {
    expect(() => splitSegments([])).toThrow(NoSegmentsError);
  });

  it('splits every segment in order', () => {
    expect(splitSegments(segments).map(split => [split.segmentIndex, split.splitIndex, split.text])).toEqual([
      [0, 0, 'I like to'],
      [0, 1, 'eat an apple'],
      [1, 0, 'Good night'],
    ]);
  });
});

describe('assembleTimeline', () => {
  it('snaps spans to whole milliseconds and treats missing assignments as empty', () => {
    const split: TextSplit = {
      text: 'third',
      span: { startSeconds: 0, endSeconds: 1 / 3 },
      keywords: ['third'],
      segmentIndex: 0,
      splitIndex: 0,
    };

    expect(assembleTimeline([split])).toEqual([{ span: { startSeconds: 0, endSeconds: 0.333 }, imagePaths: [] }]);
  });
});

describe('buildTimeline', () => {
  const assignments = buildImageAssignments([
    { segmentIndex: 0, splitIndex: 0, images: ['/img/apple.jpg'] },
    { segmentIndex: 0, splitIndex: 1, images: ['/img/apple.jpg', '/img/eat.jpg'] },
  ]);
  const build = buildTimeline(segments, assignments, { title: 'Snack' });

  it('emits one JSON entry per split', () => {
    expect(build.timeline).toEqual([
      { start: '00:00:00,000', end: '00:00:03,000', image: ['/img/apple.jpg'] },
      { start: '00:00:03,000', end: '00:00:06,000', image: ['/img/apple.jpg', '/img/eat.jpg'] },
      { start: '00:00:06,000', end: '00:00:08,500', image: [] },
    ]);
  });

  it('schedules the images on the spine', () => {
    expect(build.fcpxml.assets.map(asset => [asset.assetId, asset.name])).toEqual([
      ['r1', 'apple'],
      ['r2', 'eat'],
    ]);
    expect(build.fcpxml.spine).toEqual([
      { kind: 'video', offsetFrames: 0, durationFrames: 73, assetId: 'r1', clipName: 'apple' },
      { kind: 'video', offsetFrames: 73, durationFrames: 37, assetId: 'r1', clipName: 'apple' },
      { kind: 'video', offsetFrames: 110, durationFrames: 37, assetId: 'r2', clipName: 'eat' },
    ]);
    expect(build.fcpxml.durationFrames).toBe(204);
  });

  it('fails without segments', () => {
    expect(() => buildTimeline([], new Map(), { title: 'Nothing' })).toThrow(NoSegmentsError);
  });
});

describe('JSON timeline', () => {
  it('renders with two-space indentation and keeps non-ASCII paths', () => {
    const json = renderTimelineJson([{ span: { startSeconds: 0, endSeconds: 1.5 }, imagePaths: ['/img/café.jpg'] }]);

    expect(json).toBe(
      [
        '[',
        '  {',
        '    "start": "00:00:00,000",',
        '    "end": "00:00:01,500",',
        '    "image": [',
        '      "/img/café.jpg"',
        '    ]',
        '  }',
        ']',
      ].join('\n')
    );
  });

  it('reads entries back from JSON', () => {
    const entries = [
      { span: { startSeconds: 1.25, endSeconds: 4 }, imagePaths: ['/img/a.jpg'] },
      { span: { startSeconds: 4, endSeconds: 7.5 }, imagePaths: [] },
    ];
    expect(fromTimelineJson(toTimelineJson(entries))).toEqual(entries);
  });
});
