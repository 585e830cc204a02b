/**
 * Timeline configuration
 *
 * Values come from the environment (loaded by server/env.ts) and are
 * validated once. Every engine function also accepts an explicit config so
 * tests do not depend on process.env.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_FPS = 24;
/** 0.5s at 24fps */
export const DEFAULT_GAP_THRESHOLD_FRAMES = 12;
export const DEFAULT_SPLIT_SECONDS = 3;
export const DEFAULT_FRAME_WIDTH = 1920;
export const DEFAULT_FRAME_HEIGHT = 1080;

const fromEnv = <T extends z.ZodTypeAny>(fallback: number, schema: T) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? fallback : Number(value)),
    schema
  );

export const TimelineEnvSchema = z.object({
  TIMELINE_FPS: fromEnv(DEFAULT_FPS, z.number().int().positive()),
  TIMELINE_GAP_THRESHOLD_FRAMES: fromEnv(DEFAULT_GAP_THRESHOLD_FRAMES, z.number().int().nonnegative()),
  TIMELINE_SPLIT_SECONDS: fromEnv(DEFAULT_SPLIT_SECONDS, z.number().finite().positive()),
  TIMELINE_FRAME_WIDTH: fromEnv(DEFAULT_FRAME_WIDTH, z.number().int().positive()),
  TIMELINE_FRAME_HEIGHT: fromEnv(DEFAULT_FRAME_HEIGHT, z.number().int().positive()),
});

export interface TimelineConfig {
  readonly fps: number;
  readonly gapThresholdFrames: number;
  readonly splitSeconds: number;
  readonly frameWidth: number;
  readonly frameHeight: number;
}

export const DEFAULT_TIMELINE_CONFIG: TimelineConfig = Object.freeze({
  fps: DEFAULT_FPS,
  gapThresholdFrames: DEFAULT_GAP_THRESHOLD_FRAMES,
  splitSeconds: DEFAULT_SPLIT_SECONDS,
  frameWidth: DEFAULT_FRAME_WIDTH,
  frameHeight: DEFAULT_FRAME_HEIGHT,
});

/**
 * Validate timeline settings from an environment map.
 * Throws ConfigError naming every invalid key.
 */
export function loadTimelineConfig(env: NodeJS.ProcessEnv = process.env): TimelineConfig {
  const result = TimelineEnvSchema.safeParse(env);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map(issue => String(issue.path[0])))];
    throw new ConfigError(`Invalid timeline configuration: ${keys.join(', ')}`, keys);
  }

  const parsed = result.data;
  return Object.freeze({
    fps: parsed.TIMELINE_FPS,
    gapThresholdFrames: parsed.TIMELINE_GAP_THRESHOLD_FRAMES,
    splitSeconds: parsed.TIMELINE_SPLIT_SECONDS,
    frameWidth: parsed.TIMELINE_FRAME_WIDTH,
    frameHeight: parsed.TIMELINE_FRAME_HEIGHT,
  });
}

/**
 * Override individual settings, re-validating the frame rate.
 */
export function withOverrides(base: TimelineConfig, overrides: Partial<TimelineConfig>): TimelineConfig {
  const merged = { ...base, ...overrides };
  if (!Number.isInteger(merged.fps) || merged.fps <= 0) {
    throw new ConfigError(`Frame rate must be a positive integer, got ${merged.fps}`, ['fps']);
  }
  return Object.freeze(merged);
}
