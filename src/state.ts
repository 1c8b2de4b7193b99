/**
 * peon-ping State Store
 * Loads and saves the cross-invocation state (.state.json).
 * Every invocation is a fresh process, so this file is the only memory the
 * debounce gate, spam detector, sound selector and trainer share.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { PersistedState } from './types.js';
import { debugLog } from './log.js';

const STATE_FILE = '.state.json';
const MAX_SESSION_PACKS = 50;

const TrainerStateSchema = z.object({
    date: z.string().catch(''),
    reps: z.record(z.string(), z.number().int().nonnegative()).catch(() => ({})),
    last_reminder_ts: z.number().catch(0)
});

// Each field falls back on its own, so one bad value never wipes the rest
const PersistedStateSchema = z.object({
    last_play_ts: z.record(z.string(), z.number()).catch(() => ({})),
    last_sound_index: z.record(z.string(), z.number().int().nonnegative()).catch(() => ({})),
    recent_message_ts: z.array(z.number()).catch(() => []),
    active_pack: z.string().catch(''),
    session_packs: z.record(z.string(), z.string()).catch(() => ({})),
    trainer: TrainerStateSchema.catch(() => ({ date: '', reps: {}, last_reminder_ts: 0 }))
});

/**
 * Create an empty state
 */
export function createDefaultState(): PersistedState {
    return {
        last_play_ts: {},
        last_sound_index: {},
        recent_message_ts: [],
        active_pack: '',
        session_packs: {},
        trainer: {
            date: '',
            reps: {},
            last_reminder_ts: 0
        }
    };
}

/**
 * Validate arbitrary parsed JSON into a state, field by field
 */
export function parseState(raw: unknown): PersistedState {
    const result = PersistedStateSchema.safeParse(raw);
    if (!result.success) {
        return createDefaultState();
    }
    return result.data;
}

/**
 * Write JSON so that a concurrent reader sees either the old or the new file,
 * never a partial one: write a sibling temp file, then rename it over the target.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // Unique per call: overlapping saves in one process must not share a temp file
    const tmpPath = `${filePath}.${process.pid}.${uuidv4()}.tmp`;
    try {
        await fs.writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
        await fs.rename(tmpPath, filePath);
    } catch (error) {
        await fs.rm(tmpPath, { force: true });
        throw error;
    }
}

/**
 * StateStore reads and replaces the whole state file
 * No lock is taken: with overlapping invocations the last save wins.
 */
export class StateStore {
    private stateFile: string;

    constructor(peonDir: string, stateFile?: string) {
        this.stateFile = stateFile || path.join(peonDir, STATE_FILE);
    }

    public getStateFilePath(): string {
        return this.stateFile;
    }

    /**
     * Load the state, falling back to defaults when the file is absent or corrupt
     */
    public async load(): Promise<PersistedState> {
        let data: string;
        try {
            data = await fs.readFile(this.stateFile, 'utf-8');
        } catch (error) {
            // Missing file is the normal first-run case
            debugLog(`No readable state at ${this.stateFile}, starting fresh`, error);
            return createDefaultState();
        }

        try {
            return parseState(JSON.parse(data));
        } catch (error) {
            debugLog(`Corrupt state at ${this.stateFile}, starting fresh`, error);
            return createDefaultState();
        }
    }

    /**
     * Persist the full state
     */
    public async save(state: PersistedState): Promise<void> {
        await writeJsonAtomic(this.stateFile, {
            ...state,
            session_packs: pruneSessionPacks(state.session_packs)
        });
    }
}

/**
 * Keep only the most recently added rotation entries
 */
function pruneSessionPacks(sessionPacks: Record<string, string>): Record<string, string> {
    const entries = Object.entries(sessionPacks);
    if (entries.length <= MAX_SESSION_PACKS) {
        return sessionPacks;
    }
    return Object.fromEntries(entries.slice(-MAX_SESSION_PACKS));
}
