// MUST be first import to load environment variables before other modules
import './env.js';

import { serverLogger } from '../services/logger.js';
import { loadTimelineConfig, type TimelineConfig } from '../services/timeline/config.js';
import { isTimelineError } from '../services/timeline/errors.js';
import { createApp } from './app.js';
import { TimelineSessionStore } from './services/sessionStore.js';
import {
  PORT,
  SESSION_MAX_AGE_HOURS,
  SESSION_SWEEP_INTERVAL_MS,
  TEMP_DIR,
  cleanupSession,
  ensureDir,
} from './utils/index.js';

function loadConfigOrExit(): TimelineConfig {
  try {
    return loadTimelineConfig();
  } catch (error) {
    serverLogger.error(isTimelineError(error) ? error.message : 'Failed to load configuration', error);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

ensureDir(TEMP_DIR);

const store = new TimelineSessionStore({
  onEvict: session => cleanupSession(session.sessionId, TEMP_DIR),
});

const app = createApp({ store, workDir: TEMP_DIR, config });

// Sweep expired sessions; the timer must not keep the process alive
const sweepTimer = setInterval(() => {
  store.evictExpired(SESSION_MAX_AGE_HOURS * 60 * 60 * 1000);
}, SESSION_SWEEP_INTERVAL_MS);
sweepTimer.unref();

app.listen(PORT, () => {
  serverLogger.info(`Timeline server running on http://localhost:${PORT}`);
  serverLogger.info(`Working directory: ${TEMP_DIR}`);
  serverLogger.info(`Timeline: ${config.fps} fps, gap threshold ${config.gapThresholdFrames} frames, ${config.splitSeconds}s splits`);
});
