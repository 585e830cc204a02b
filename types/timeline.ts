/**
 * Timeline Types
 *
 * Data model shared by the subtitle splitter, the clip scheduler and the
 * FCPXML exporter. All times are seconds unless the field name says frames.
 */

/**
 * A closed-open interval on the timeline. `endSeconds > startSeconds`.
 */
export interface TimeSpan {
  startSeconds: number;
  endSeconds: number;
}

/**
 * One parsed subtitle entry.
 */
export interface TextSegment {
  readonly text: string;
  readonly span: TimeSpan;
  /** 0-based position among the accepted segments */
  readonly segmentIndex: number;
  /** Cue number as written in the subtitle file, when known */
  readonly cueNumber?: number;
}

/**
 * A sub-interval of a TextSegment produced by the duration splitter.
 */
export interface TextSplit {
  text: string;
  span: TimeSpan;
  /** Ordered, de-duplicated keywords */
  keywords: string[];
  segmentIndex: number;
  /** 0-based within the parent segment */
  splitIndex: number;
}

/**
 * The externally visible unit: one per TextSplit, possibly without images.
 */
export interface TimelineEntry {
  span: TimeSpan;
  imagePaths: string[];
}

/**
 * Serialized form of a TimelineEntry (the JSON timeline file).
 */
export interface TimelineJsonEntry {
  start: string;
  end: string;
  image: string[];
}

/**
 * A unique media reference shared by one or more clips.
 */
export interface AssetResource {
  /** "r1", "r2", ... ("r0" is the format descriptor) */
  assetId: string;
  imagePath: string;
  /** File name without extension */
  name: string;
  /** file:// reference written into the media-rep element */
  mediaUrl: string;
}

/**
 * One candidate still-image clip. The span is trimmed during overlap resolution.
 */
export interface Clip {
  span: TimeSpan;
  imagePath: string;
  assetId: string;
}

/**
 * A clip quantized to integer frames. `endFrame` is inclusive.
 */
export interface FrameClip {
  startFrame: number;
  endFrame: number;
  assetId: string;
  clipName: string;
}

export interface GapElement {
  kind: 'gap';
  offsetFrames: number;
  durationFrames: number;
}

export interface VideoElement {
  kind: 'video';
  offsetFrames: number;
  durationFrames: number;
  assetId: string;
  clipName: string;
}

/**
 * Element of the sequence spine, in output order.
 */
export type SpineElement = GapElement | VideoElement;

/**
 * Image selection per split, keyed by `splitKey(segmentIndex, splitIndex)`.
 * Missing keys mean zero images.
 */
export type ImageAssignments = ReadonlyMap<string, readonly string[]>;

export interface ImageAssignmentInput {
  segmentIndex: number;
  splitIndex: number;
  images: string[];
}
