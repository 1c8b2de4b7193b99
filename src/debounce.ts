/**
 * peon-ping Debounce Gate
 * Suppresses a category that reacted less than debounce_ms ago
 */

import type { PersistedState } from './types.js';

export class DebounceGate {
    private static instance: DebounceGate;

    private constructor() { }

    public static getInstance(): DebounceGate {
        if (!DebounceGate.instance) {
            DebounceGate.instance = new DebounceGate();
        }
        return DebounceGate.instance;
    }

    /**
     * Decide whether `category` is still cooling down at `now` (epoch seconds).
     * The category's timestamp is updated whatever the answer.
     */
    public shouldSkip(state: PersistedState, category: string, now: number, debounceMs: number): boolean {
        const last = state.last_play_ts[category];
        state.last_play_ts[category] = now;

        if (last === undefined) {
            return false;
        }
        return (now - last) * 1000 < debounceMs;
    }
}

export const debounceGate = DebounceGate.getInstance();
