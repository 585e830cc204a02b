import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from '../../services/logger.js';

const cleanupLog = createLogger('Cleanup');

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Note: evaluated at import time, so server/env.ts must be loaded first
export const TEMP_DIR = process.env.TIMELINE_WORK_DIR
  ? path.resolve(process.env.TIMELINE_WORK_DIR)
  : path.join(__dirname, '../../temp');

export const PORT = parseInt(process.env.PORT || '3001', 10);

// File size limits for different upload types
export const MAX_SRT_FILE = 5 * 1024 * 1024; // 5MB - subtitle files
export const MAX_IMAGE_FILE = 25 * 1024 * 1024; // 25MB - per image
export const MAX_IMAGES_PER_SPLIT = 20;

export const SESSION_MAX_AGE_HOURS = Number(process.env.SESSION_MAX_AGE_HOURS || 24);
export const SESSION_SWEEP_INTERVAL_MS = 60 * 60 * 1000; // hourly

/**
 * Sanitize session ID to prevent path traversal
 */
export const sanitizeId = (id: string): string => {
  return id.replace(/[^a-zA-Z0-9_-]/g, '');
};

/**
 * Make a title usable as part of a file name
 */
export const sanitizeFileName = (name: string): string => {
  const cleaned = name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '');
  return cleaned || 'timeline';
};

/**
 * Get the session directory path
 */
export const getSessionDir = (sessionId: string, baseDir: string = TEMP_DIR): string => {
  return path.join(baseDir, sanitizeId(sessionId));
};

/**
 * Cleanup a session directory
 */
export const cleanupSession = (sessionId: string, baseDir: string = TEMP_DIR): void => {
  const dir = getSessionDir(sessionId, baseDir);
  if (fs.existsSync(dir)) {
    try {
      fs.rmSync(dir, { recursive: true, force: true });
      cleanupLog.info(`Successfully removed session ${sessionId}`);
    } catch (e) {
      cleanupLog.error(`Failed to remove session ${sessionId}:`, e);
    }
  }
};

/**
 * Ensure a directory exists
 */
export const ensureDir = (dir: string): void => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};
