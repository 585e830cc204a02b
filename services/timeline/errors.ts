/**
 * Timeline Error Types
 *
 * Every failure raised by the timeline engine carries a stable `code` so the
 * HTTP layer and the CLI can decide how to report it.
 */

export type TimelineErrorCode =
    | "MALFORMED_TIMESTAMP"
    | "INVALID_TIME_SPAN"
    | "NO_SEGMENTS"
    | "INVALID_SPLIT_COUNT"
    | "ASSET_REFERENCE"
    | "CONFIG_ERROR"
    | "SESSION_NOT_FOUND";

export class TimelineError extends Error {
    constructor(message: string, public readonly code: TimelineErrorCode) {
        super(message);
        this.name = "TimelineError";
    }
}

/** Unparseable time string. Callers skip the offending segment. */
export class MalformedTimestampError extends TimelineError {
    constructor(public readonly input: string) {
        super(`Malformed timestamp: "${input}"`, "MALFORMED_TIMESTAMP");
        this.name = "MalformedTimestampError";
    }
}

export class InvalidTimeSpanError extends TimelineError {
    constructor(public readonly startSeconds: number, public readonly endSeconds: number) {
        super(`Time span must end after it starts (start=${startSeconds}, end=${endSeconds})`, "INVALID_TIME_SPAN");
        this.name = "InvalidTimeSpanError";
    }
}

/** Empty input. Fatal for a single timeline build. */
export class NoSegmentsError extends TimelineError {
    constructor(message: string = "No subtitle segments to build a timeline from") {
        super(message, "NO_SEGMENTS");
        this.name = "NoSegmentsError";
    }
}

/** Internal invariant violation in the duration splitter. */
export class InvalidSplitCountError extends TimelineError {
    constructor(public readonly splitCount: number, public readonly segmentIndex: number) {
        super(`Invalid split count ${splitCount} for segment ${segmentIndex}`, "INVALID_SPLIT_COUNT");
        this.name = "InvalidSplitCountError";
    }
}

/** Image path that cannot be turned into a file reference. */
export class AssetReferenceError extends TimelineError {
    constructor(public readonly imagePath: string, reason: string) {
        super(`Cannot reference image "${imagePath}": ${reason}`, "ASSET_REFERENCE");
        this.name = "AssetReferenceError";
    }
}

export class ConfigError extends TimelineError {
    constructor(message: string, public readonly keys: string[] = []) {
        super(message, "CONFIG_ERROR");
        this.name = "ConfigError";
    }
}

export class SessionNotFoundError extends TimelineError {
    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} not found`, "SESSION_NOT_FOUND");
        this.name = "SessionNotFoundError";
    }
}

export function isTimelineError(error: unknown): error is TimelineError {
    return error instanceof TimelineError;
}
