/**
 * FCPXML Serializer
 *
 * Renders a timeline as an FCPXML 1.13 document: a format descriptor (r0),
 * one asset per unique image, and a single sequence whose spine holds the
 * scheduled video and gap elements.
 */

import type { AssetResource, SpineElement, TimelineEntry } from '../../types/timeline.js';
import { timelineLogger } from '../logger.js';
import { collectAssets, materializeClips } from './clipMaterializer.js';
import { DEFAULT_TIMELINE_CONFIG, type TimelineConfig } from './config.js';
import { buildSpine } from './frameQuantizer.js';
import { resolveOverlaps } from './overlapResolver.js';
import { framesToRational, secondsToFrame } from './timeCodec.js';

const log = timelineLogger.child('Serializer');

const FCPXML_VERSION = '1.13';
const SPINE_INDENT = ' '.repeat(24);

export interface FcpxmlDocument {
  xml: string;
  assets: AssetResource[];
  spine: SpineElement[];
  /** Image paths left out because they cannot be referenced */
  omittedAssets: string[];
  durationFrames: number;
}

// Characters outside the XML 1.0 Char production, including unpaired surrogates
const XML_ILLEGAL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Escape markup characters and drop those XML cannot carry at all.
 */
export function escapeXml(value: string): string {
  return value
    .replace(XML_ILLEGAL_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Sequence length in frames, taken from the end of the last entry.
 */
export function sequenceDurationFrames(entries: readonly TimelineEntry[], fps: number): number {
  const last = entries[entries.length - 1];
  return last === undefined ? 0 : secondsToFrame(last.span.endSeconds, fps);
}

function renderAsset(asset: AssetResource): string {
  return [
    `        <asset start="0/1s" id="${asset.assetId}" duration="0/1s" name="${escapeXml(asset.name)}" hasVideo="1">`,
    `            <media-rep src="${escapeXml(asset.mediaUrl)}" kind="original-media"/>`,
    `        </asset>`,
  ].join('\n');
}

function renderSpineElement(element: SpineElement, fps: number): string {
  const offset = framesToRational(element.offsetFrames, fps);
  const duration = framesToRational(element.durationFrames, fps);

  if (element.kind === 'gap') {
    return `${SPINE_INDENT}<gap start="0/1s" offset="${offset}" duration="${duration}" name="Gap"/>`;
  }

  return [
    `${SPINE_INDENT}<video ref="${element.assetId}" start="0/1s" offset="${offset}" duration="${duration}" name="${escapeXml(element.clipName)}" enabled="1">`,
    `${SPINE_INDENT}    <adjust-transform scale="1 1" position="0 0" anchor="0 0"/>`,
    `${SPINE_INDENT}</video>`,
  ].join('\n');
}

/**
 * Schedule the entries' images and render the document.
 */
export function generateFcpxml(
  entries: readonly TimelineEntry[],
  title: string,
  config: TimelineConfig = DEFAULT_TIMELINE_CONFIG
): FcpxmlDocument {
  const { fps, gapThresholdFrames, frameWidth, frameHeight } = config;

  const registry = collectAssets(entries);
  const clips = resolveOverlaps(materializeClips(entries, registry));
  log.debug(`${clips.length} clips after overlap resolution`);

  const spine = buildSpine(clips, { fps, gapThresholdFrames });
  const durationFrames = sequenceDurationFrames(entries, fps);
  const safeTitle = escapeXml(title);

  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE fcpxml>',
    `<fcpxml version="${FCPXML_VERSION}">`,
    '    <resources>',
    `        <format width="${frameWidth}" id="r0" height="${frameHeight}" name="FFVideoFormatRateUndefined" frameDuration="1/${fps}s"/>`,
    ...registry.assets.map(renderAsset),
    '    </resources>',
    '    <library>',
    `        <event name="${safeTitle}">`,
    `            <project name="${safeTitle}">`,
    `                <sequence tcStart="0/1s" duration="${framesToRational(durationFrames, fps)}" format="r0" tcFormat="NDF">`,
    '                    <spine>',
    ...spine.map(element => renderSpineElement(element, fps)),
    '                    </spine>',
    '                </sequence>',
    '            </project>',
    '        </event>',
    '    </library>',
    '</fcpxml>',
  ];

  return {
    xml: lines.join('\n'),
    assets: registry.assets,
    spine,
    omittedAssets: registry.omitted,
    durationFrames,
  };
}
