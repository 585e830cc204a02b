#!/usr/bin/env node
/**
 * Subtitle → image timeline generator
 *
 * Parses an SRT file, splits each cue into ~3s pieces and writes the JSON
 * timeline plus an FCPXML document. Images come from a manifest:
 *   [{ "segmentIndex": 0, "splitIndex": 1, "images": ["shots/a.jpg"] }]
 * Without one every split is empty and the timeline is all gaps.
 *
 * Run with: npx tsx scripts/generate-timeline.ts talk.srt "My Talk" --images manifest.json --preview
 */

import '../server/env.js';

import { realpathSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { cliLogger } from '../services/logger.js';
import {
  buildImageAssignments,
  buildTimeline,
  computeSplitStatistics,
  formatTimelinePreview,
  loadTimelineConfig,
  renderTimelineJson,
  summarizeTimeline,
  withOverrides,
  type TimelineConfig,
} from '../services/timeline/index.js';
import type { ImageAssignments } from '../types/timeline.js';
import { readSrtFile } from '../utils/srtParser.js';
import { ImageManifestSchema, formatZodError } from '../server/schemas.js';

export const USAGE = `Usage: generate-timeline <srt-file> <title> [options]

Options:
  --images <manifest.json>  Image selection per split
  -o, --output <file>       JSON timeline path (default: timeline.json)
  --fcpxml <file>           FCPXML path (default: output path with .fcpxml)
  --fps <n>                 Frame rate (default: TIMELINE_FPS or 24)
  --preview                 Log a preview of the timeline
  --stats                   Log split statistics and a timeline summary
  -h, --help                Show this help`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliOptions {
  srtFile: string;
  title: string;
  imagesManifest?: string;
  output: string;
  fcpxml: string;
  fps?: number;
  preview: boolean;
  stats: boolean;
  help: boolean;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        images: { type: 'string' },
        output: { type: 'string', short: 'o', default: 'timeline.json' },
        fcpxml: { type: 'string' },
        fps: { type: 'string' },
        preview: { type: 'boolean', default: false },
        stats: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);
  const output = values.output ?? 'timeline.json';
  const options: CliOptions = {
    srtFile: positionals[0] ?? '',
    title: positionals[1] ?? '',
    imagesManifest: values.images,
    output,
    fcpxml: values.fcpxml ?? `${output.replace(/\.json$/i, '')}.fcpxml`,
    preview: values.preview ?? false,
    stats: values.stats ?? false,
    help: values.help ?? false,
  };

  if (options.help) return options;

  if (positionals.length !== 2) {
    throw new CliUsageError(`Expected <srt-file> and <title>, got ${positionals.length} arguments`);
  }
  if (!options.title.trim()) {
    throw new CliUsageError('Title must not be empty');
  }

  if (values.fps !== undefined) {
    const fps = Number(values.fps);
    if (!Number.isInteger(fps) || fps <= 0) {
      throw new CliUsageError(`--fps must be a positive integer, got "${values.fps}"`);
    }
    options.fps = fps;
  }

  return options;
}

/**
 * Read and validate an image manifest. Relative image paths resolve against
 * the manifest's own directory.
 */
export async function loadImageManifest(manifestPath: string): Promise<ImageAssignments> {
  const raw = await fs.readFile(manifestPath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliUsageError(`Image manifest ${manifestPath} is not valid JSON: ${reason}`);
  }

  const result = ImageManifestSchema.safeParse(json);
  if (!result.success) {
    throw new CliUsageError(`Invalid image manifest ${manifestPath}: ${formatZodError(result.error)}`);
  }

  const baseDir = path.dirname(path.resolve(manifestPath));
  return buildImageAssignments(
    result.data.map(item => ({
      ...item,
      images: item.images.map(image => (image && !path.isAbsolute(image) ? path.resolve(baseDir, image) : image)),
    }))
  );
}

export interface CliResult {
  entries: number;
  omittedAssets: string[];
}

export async function runTimelineCli(options: CliOptions, baseConfig: TimelineConfig = loadTimelineConfig()): Promise<CliResult> {
  const config = options.fps !== undefined ? withOverrides(baseConfig, { fps: options.fps }) : baseConfig;

  cliLogger.info(`SRT file: ${options.srtFile}`);
  cliLogger.info(`Title: ${options.title}`);

  const { segments, skipped } = await readSrtFile(options.srtFile);
  if (skipped.length > 0) {
    cliLogger.warn(`Skipped ${skipped.length} malformed subtitle blocks`);
  }

  const assignments = options.imagesManifest
    ? await loadImageManifest(options.imagesManifest)
    : new Map<string, readonly string[]>();

  const build = buildTimeline(segments, assignments, { title: options.title, config });

  await fs.writeFile(options.output, renderTimelineJson(build.entries), 'utf-8');
  await fs.writeFile(options.fcpxml, build.fcpxml.xml, 'utf-8');

  if (options.preview) {
    formatTimelinePreview(build.entries).forEach(line => cliLogger.info(line));
  }

  if (options.stats) {
    const splitStats = computeSplitStatistics(build.splits);
    const summary = summarizeTimeline(build.entries);
    cliLogger.info(`Original segments: ${segments.length}`);
    cliLogger.info(`Text splits created: ${splitStats.totalSplits}`);
    cliLogger.info(`Average split duration: ${splitStats.averageDuration}s`);
    cliLogger.info(`Average keywords per split: ${splitStats.averageKeywords}`);
    cliLogger.info(`Entries with images: ${summary.entriesWithImages}/${summary.totalEntries}`);
    cliLogger.info(`Images: ${summary.totalImages} (${summary.uniqueImages} unique)`);
  }

  if (build.fcpxml.omittedAssets.length > 0) {
    cliLogger.warn(`Omitted ${build.fcpxml.omittedAssets.length} images that cannot be referenced`);
  }

  cliLogger.info(`Timeline: ${options.output} (${build.entries.length} entries)`);
  cliLogger.info(`FCPXML: ${options.fcpxml}`);

  return { entries: build.entries.length, omittedAssets: build.fcpxml.omittedAssets };
}

export async function main(argv: string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    await runTimelineCli(options);
    return 0;
  } catch (error) {
    cliLogger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof CliUsageError) {
      console.error(USAGE);
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      cliLogger.error('Unexpected failure', error);
      process.exit(1);
    }
  );
}
