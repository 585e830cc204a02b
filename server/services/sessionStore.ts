/**
 * Timeline Session Store
 *
 * Owns the per-user state of the interactive flow: the parsed subtitle,
 * its splits and the images chosen for each split. Sessions are keyed by
 * an opaque uuid and live until removed or evicted.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ImageAssignments, TextSegment, TextSplit } from '../../types/timeline.js';
import { createLogger } from '../../services/logger.js';
import { SessionNotFoundError } from '../../services/timeline/errors.js';
import { splitKey } from '../../services/timeline/timelineBuilder.js';

const log = createLogger('SessionStore');

export interface TimelineSession {
  readonly sessionId: string;
  readonly title: string;
  readonly createdAt: number;
  /** Working directory for uploads and exports */
  readonly directory: string;
  readonly segments: readonly TextSegment[];
  readonly splits: readonly TextSplit[];
  /** Selected image paths by position in `splits` */
  readonly selections: Map<number, string[]>;
}

export interface CreateSessionInput {
  title: string;
  segments: readonly TextSegment[];
  splits: readonly TextSplit[];
  /** Called with the new id; returns the working directory */
  directoryFor: (sessionId: string) => string;
}

export type EvictionHook = (session: TimelineSession) => void;

export class TimelineSessionStore {
  private sessions: Map<string, TimelineSession> = new Map();
  private onEvict: EvictionHook | null;
  private now: () => number;

  constructor(options: { onEvict?: EvictionHook; now?: () => number } = {}) {
    this.onEvict = options.onEvict ?? null;
    this.now = options.now ?? Date.now;
  }

  create(input: CreateSessionInput): TimelineSession {
    const sessionId = uuidv4();
    const session: TimelineSession = {
      sessionId,
      title: input.title,
      createdAt: this.now(),
      directory: input.directoryFor(sessionId),
      segments: input.segments,
      splits: input.splits,
      selections: new Map(),
    };

    this.sessions.set(sessionId, session);
    log.info(`Created session ${sessionId} (${input.splits.length} splits)`);
    return session;
  }

  /**
   * Get a session by ID. Throws SessionNotFoundError when absent.
   */
  get(sessionId: string): TimelineSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  list(): TimelineSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Remove a session. Returns whether it existed; runs the eviction hook.
   */
  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    this.onEvict?.(session);
    return true;
  }

  /**
   * Replace the image selection of one split.
   */
  assignImages(sessionId: string, splitIndex: number, imagePaths: readonly string[]): string[] {
    const session = this.get(sessionId);
    if (!Number.isInteger(splitIndex) || splitIndex < 0 || splitIndex >= session.splits.length) {
      throw new RangeError(`Split index ${splitIndex} out of range (0-${session.splits.length - 1})`);
    }

    const selection = [...imagePaths];
    session.selections.set(splitIndex, selection);
    return selection;
  }

  /**
   * Selections keyed by (segment, split), ready for the timeline builder.
   */
  imageAssignments(sessionId: string): ImageAssignments {
    const session = this.get(sessionId);
    const assignments = new Map<string, readonly string[]>();

    session.selections.forEach((paths, splitIndex) => {
      const split = session.splits[splitIndex];
      if (split) {
        assignments.set(splitKey(split.segmentIndex, split.splitIndex), paths);
      }
    });

    return assignments;
  }

  /**
   * Remove sessions older than `maxAgeMs`. Returns how many were removed.
   */
  evictExpired(maxAgeMs: number, now: number = this.now()): number {
    const cutoff = now - maxAgeMs;
    const expired = this.list().filter(session => session.createdAt < cutoff);

    expired.forEach(session => this.remove(session.sessionId));
    if (expired.length > 0) {
      log.info(`Evicted ${expired.length} expired sessions`);
    }
    return expired.length;
  }
}
