import type { TimelineConfig } from '../services/timeline/config.js';
import type { TimelineSessionStore } from './services/sessionStore.js';

export interface ServerContext {
    store: TimelineSessionStore;
    /** Root directory for session working directories */
    workDir: string;
    config: TimelineConfig;
}

export interface ApiErrorBody {
    success: false;
    error: string;
}
