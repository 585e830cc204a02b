/**
 * Gap Bridging & Frame Quantizer
 *
 * Moves resolved clips onto integer frames, lets a clip swallow a short
 * gap before the next one, and lays the result out as a spine of video and
 * gap elements.
 *
 * Frame convention: `endFrame` counts as occupied, so a clip lasts
 * `endFrame - startFrame + 1` frames and the gap before the next clip is
 * measured as `next.startFrame - prev.endFrame + 1`.
 */

import type { Clip, FrameClip, SpineElement } from '../../types/timeline.js';
import { timelineLogger } from '../logger.js';
import { DEFAULT_FPS, DEFAULT_GAP_THRESHOLD_FRAMES } from './config.js';
import { mediaName } from './mediaReference.js';
import { secondsToFrame } from './timeCodec.js';

const log = timelineLogger.child('Quantizer');

export function quantizeClips(clips: readonly Clip[], fps: number = DEFAULT_FPS): FrameClip[] {
  return clips.map(clip => ({
    startFrame: secondsToFrame(clip.span.startSeconds, fps),
    endFrame: secondsToFrame(clip.span.endSeconds, fps),
    assetId: clip.assetId,
    clipName: mediaName(clip.imagePath),
  }));
}

/**
 * Extend a clip forward to the next clip's start when the gap between them
 * is 1..threshold frames. Larger gaps, and adjacent or overlapping frames,
 * are left alone.
 */
export function bridgeSmallGaps(
  frameClips: readonly FrameClip[],
  gapThresholdFrames: number = DEFAULT_GAP_THRESHOLD_FRAMES
): FrameClip[] {
  const bridged: FrameClip[] = [];

  for (const clip of frameClips) {
    const previous = bridged[bridged.length - 1];
    bridged.push({ ...clip });
    if (previous === undefined) continue;

    const gap = clip.startFrame - previous.endFrame + 1;
    if (gap > 0 && gap <= gapThresholdFrames) {
      log.debug(`Extending ${previous.clipName} by ${gap} frames to cover small gap`);
      previous.endFrame = clip.startFrame;
    } else if (gap > 0) {
      log.debug(`Keeping gap of ${gap} frames before ${clip.clipName}`);
    }
  }

  return bridged;
}

/**
 * Lay clips out in order, emitting a gap element wherever a clip starts
 * after the running cursor.
 */
export function layoutSpine(frameClips: readonly FrameClip[]): SpineElement[] {
  const spine: SpineElement[] = [];
  let cursor = 0;

  for (const clip of frameClips) {
    if (clip.startFrame > cursor) {
      spine.push({ kind: 'gap', offsetFrames: cursor, durationFrames: clip.startFrame - cursor });
      cursor = clip.startFrame;
    }

    const durationFrames = clip.endFrame - clip.startFrame + 1;
    spine.push({
      kind: 'video',
      offsetFrames: cursor,
      durationFrames,
      assetId: clip.assetId,
      clipName: clip.clipName,
    });
    cursor += durationFrames;
  }

  return spine;
}

export interface QuantizeOptions {
  fps?: number;
  gapThresholdFrames?: number;
}

/**
 * Quantize, bridge and lay out in one pass.
 */
export function buildSpine(clips: readonly Clip[], options: QuantizeOptions = {}): SpineElement[] {
  const { fps = DEFAULT_FPS, gapThresholdFrames = DEFAULT_GAP_THRESHOLD_FRAMES } = options;
  return layoutSpine(bridgeSmallGaps(quantizeClips(clips, fps), gapThresholdFrames));
}
