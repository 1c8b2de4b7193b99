/**
 * peon-ping Spam Detector
 * Flags bursts of user prompts inside a sliding window.
 * There is no cooldown after tripping: every message of a sustained burst trips it again.
 */

import type { PeonConfig, PersistedState } from './types.js';

export class SpamDetector {
    private static instance: SpamDetector;

    private constructor() { }

    public static getInstance(): SpamDetector {
        if (!SpamDetector.instance) {
            SpamDetector.instance = new SpamDetector();
        }
        return SpamDetector.instance;
    }

    /**
     * Drop timestamps that fell out of the window ending at `now`
     */
    public prune(state: PersistedState, windowSeconds: number, now: number): number[] {
        state.recent_message_ts = state.recent_message_ts.filter(ts => now - ts <= windowSeconds);
        return state.recent_message_ts;
    }

    /**
     * Record a user message at `now` (epoch seconds) and report whether the
     * window now holds a burst. With user.spam disabled the message is still
     * recorded but never reported.
     */
    public recordAndCheck(state: PersistedState, config: PeonConfig, now: number): boolean {
        state.recent_message_ts.push(now);
        const recent = this.prune(state, config.spam_window_seconds, now);

        if (config.categories['user.spam'] === false) {
            return false;
        }
        return recent.length >= config.spam_threshold;
    }
}

export const spamDetector = SpamDetector.getInstance();
