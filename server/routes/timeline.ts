import { Router, Request, Response } from 'express';
import fs from 'fs';
import path from 'path';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../services/logger.js';
import { combinedQuery, generateSearchQueries } from '../../services/searchQueryGenerator.js';
import { withOverrides } from '../../services/timeline/config.js';
import { generateFcpxml } from '../../services/timeline/fcpxmlSerializer.js';
import { formatTimestamp } from '../../services/timeline/timeCodec.js';
import {
  assembleTimeline,
  buildImageAssignments,
  buildTimeline,
  createSegments,
  renderTimelineJson,
  splitSegments,
} from '../../services/timeline/timelineBuilder.js';
import { computeSplitStatistics } from '../../services/timeline/timelineStats.js';
import { parseSrt } from '../../utils/srtParser.js';
import { BuildTimelineRequestSchema, CreateSessionFieldsSchema, ExportRequestSchema } from '../schemas.js';
import type { ServerContext } from '../types.js';
import { HttpError, sendError } from '../utils/httpErrors.js';
import {
  MAX_IMAGE_FILE,
  MAX_IMAGES_PER_SPLIT,
  MAX_SRT_FILE,
  ensureDir,
  getSessionDir,
  sanitizeFileName,
} from '../utils/index.js';

const timelineLog = createLogger('TimelineAPI');

const SPLIT_INDEX = /^\d+$/;

function parseSplitIndex(raw: string): number {
  if (!SPLIT_INDEX.test(raw)) {
    throw new HttpError(400, `Invalid split index "${raw}"`);
  }
  return parseInt(raw, 10);
}

function splitImagesDir(sessionDir: string, splitIndex: number): string {
  return path.join(sessionDir, 'images', String(splitIndex));
}

/**
 * Claim `name`, or `1_name`, `2_name`, ... when an earlier file of the same
 * upload already took it.
 */
export function uniqueFileName(name: string, taken: Set<string>): string {
  let candidate = name;
  for (let n = 1; taken.has(candidate); n++) {
    candidate = `${n}_${name}`;
  }
  taken.add(candidate);
  return candidate;
}

export function createTimelineRouter(ctx: ServerContext): Router {
  const router = Router();
  const { store } = ctx;

  // Subtitle uploads are parsed straight from memory
  const uploadSrt = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_SRT_FILE, files: 1 },
  });

  // Images are written to a staging directory that replaces the split's
  // images only once the whole upload is accepted
  const uploadSplitImages = (stagingDir: string) => {
    const taken = new Set<string>();

    return multer({
      storage: multer.diskStorage({
        destination: stagingDir,
        filename: (_req, file, cb) => {
          cb(null, uniqueFileName(sanitizeFileName(path.basename(file.originalname)), taken));
        },
      }),
      limits: { fileSize: MAX_IMAGE_FILE, files: MAX_IMAGES_PER_SPLIT },
      fileFilter: (_req, file, cb) => {
        if (file.mimetype.startsWith('image/')) {
          cb(null, true);
        } else {
          cb(new HttpError(400, `Not an image: ${file.originalname} (${file.mimetype})`));
        }
      },
    }).array('images', MAX_IMAGES_PER_SPLIT);
  };

  /**
   * Stateless build
   * Segments and image assignments in, JSON timeline and FCPXML out.
   */
  router.post('/build', (req: Request, res: Response) => {
    try {
      const body = BuildTimelineRequestSchema.parse(req.body);
      const config = body.fps !== undefined ? withOverrides(ctx.config, { fps: body.fps }) : ctx.config;

      const build = buildTimeline(
        createSegments(body.segments),
        buildImageAssignments(body.images ?? []),
        { title: body.title, config }
      );

      res.json({
        success: true,
        timeline: build.timeline,
        fcpxml: build.fcpxml.xml,
        omittedAssets: build.fcpxml.omittedAssets,
        stats: computeSplitStatistics(build.splits),
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Build');
    }
  });

  /**
   * Create Session
   * Receives the SRT file, parses and splits it.
   */
  router.post('/sessions', uploadSrt.single('srt'), (req: Request, res: Response) => {
    try {
      const { title } = CreateSessionFieldsSchema.parse(req.body);
      if (!req.file) {
        throw new HttpError(400, 'SRT file is required (field "srt")');
      }

      const { segments, skipped } = parseSrt(req.file.buffer.toString('utf-8'));
      const splits = splitSegments(segments, { config: ctx.config });

      const session = store.create({
        title,
        segments,
        splits,
        directoryFor: sessionId => getSessionDir(sessionId, ctx.workDir),
      });
      ensureDir(session.directory);

      res.json({
        success: true,
        sessionId: session.sessionId,
        title: session.title,
        segmentsCount: segments.length,
        splitsCount: splits.length,
        skipped,
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Session create');
    }
  });

  router.get('/sessions/:sessionId', (req: Request, res: Response) => {
    try {
      const session = store.get(req.params.sessionId);

      res.json({
        success: true,
        sessionId: session.sessionId,
        title: session.title,
        createdAt: new Date(session.createdAt).toISOString(),
        splits: session.splits.map((split, index) => ({
          index,
          segmentIndex: split.segmentIndex,
          splitIndex: split.splitIndex,
          cueNumber: session.segments[split.segmentIndex]?.cueNumber ?? null,
          start: formatTimestamp(split.span.startSeconds),
          end: formatTimestamp(split.span.endSeconds),
          text: split.text,
          keywords: split.keywords,
          query: combinedQuery(split.keywords),
          queries: generateSearchQueries(split.keywords),
          selectedImagesCount: session.selections.get(index)?.length ?? 0,
        })),
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Session read');
    }
  });

  /**
   * Select Images
   * Replaces the images of one split with the uploaded files. A rejected
   * upload leaves the previous selection in place.
   */
  router.post('/sessions/:sessionId/splits/:splitIndex/images', (req: Request, res: Response) => {
    try {
      const session = store.get(req.params.sessionId);
      const splitIndex = parseSplitIndex(req.params.splitIndex);
      if (splitIndex >= session.splits.length) {
        throw new RangeError(`Split index ${splitIndex} out of range (0-${session.splits.length - 1})`);
      }

      const stagingDir = path.join(session.directory, 'images', `.upload-${uuidv4()}`);
      ensureDir(stagingDir);

      uploadSplitImages(stagingDir)(req, res, (uploadError?: unknown) => {
        try {
          if (uploadError) {
            throw uploadError;
          }
          const files = Array.isArray(req.files) ? req.files : [];
          if (files.length === 0) {
            throw new HttpError(400, 'No images uploaded (field "images")');
          }

          const imagesDir = splitImagesDir(session.directory, splitIndex);
          fs.rmSync(imagesDir, { recursive: true, force: true });
          fs.renameSync(stagingDir, imagesDir);

          const selection = store.assignImages(
            session.sessionId,
            splitIndex,
            files.map(file => path.resolve(imagesDir, file.filename))
          );

          timelineLog.info(`Session ${session.sessionId}: ${selection.length} images for split ${splitIndex}`);
          res.json({
            success: true,
            splitIndex,
            selectedCount: selection.length,
            images: files.map(file => file.filename),
          });
        } catch (error: unknown) {
          fs.rmSync(stagingDir, { recursive: true, force: true });
          sendError(res, error, timelineLog, 'Image upload');
        }
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Image upload');
    }
  });

  /**
   * Export
   * Writes the JSON timeline and the FCPXML document into the session directory.
   */
  router.post('/sessions/:sessionId/export', async (req: Request, res: Response) => {
    try {
      const session = store.get(req.params.sessionId);
      const { fps } = ExportRequestSchema.parse(req.body ?? {});
      const config = fps !== undefined ? withOverrides(ctx.config, { fps }) : ctx.config;

      const entries = assembleTimeline(session.splits, store.imageAssignments(session.sessionId));
      const document = generateFcpxml(entries, session.title, config);

      const baseName = sanitizeFileName(session.title);
      const timelineFile = `${baseName}_timeline.json`;
      const fcpxmlFile = `${baseName}_timeline.fcpxml`;

      ensureDir(session.directory);
      await fs.promises.writeFile(path.join(session.directory, timelineFile), renderTimelineJson(entries), 'utf-8');
      await fs.promises.writeFile(path.join(session.directory, fcpxmlFile), document.xml, 'utf-8');

      timelineLog.info(`Exported session ${session.sessionId}: ${entries.length} entries`);
      res.json({
        success: true,
        timelineFile,
        fcpxmlFile,
        totalEntries: entries.length,
        omittedAssets: document.omittedAssets,
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Export');
    }
  });

  router.get('/sessions/:sessionId/files/:fileName', (req: Request, res: Response) => {
    try {
      const session = store.get(req.params.sessionId);
      const fileName = path.basename(req.params.fileName);
      const filePath = path.join(session.directory, fileName);

      if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
        throw new HttpError(404, `File ${fileName} not found`);
      }

      res.download(filePath, fileName, (error) => {
        if (error) {
          timelineLog.error(`Download of ${fileName} failed:`, error);
        }
      });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Download');
    }
  });

  router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
    try {
      const session = store.get(req.params.sessionId);
      store.remove(session.sessionId);
      res.json({ success: true, sessionId: session.sessionId });
    } catch (error: unknown) {
      sendError(res, error, timelineLog, 'Session delete');
    }
  });

  return router;
}
