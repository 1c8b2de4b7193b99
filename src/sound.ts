/**
 * peon-ping Sound Selector
 * Resolves a category to one sound of the active pack without repeating the previous pick
 */

import { CESP_CATEGORIES } from './types.js';
import type { CespCategory, PackManifest, PersistedState, SoundEntry } from './types.js';

/**
 * Uniform source in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Legacy category names used by packs that predate CESP
 */
export const CATEGORY_ALIASES: Readonly<Record<string, CespCategory>> = {
    greeting: 'session.start',
    acknowledge: 'task.acknowledge',
    complete: 'task.complete',
    error: 'task.error',
    permission: 'input.required',
    resource_limit: 'resource.limit',
    annoyed: 'user.spam'
};

export function isCespCategory(value: string): value is CespCategory {
    return CESP_CATEGORIES.some(category => category === value);
}

/**
 * Map a category name to its CESP name, or null when it names nothing known
 */
export function resolveCategory(category: string, extraAliases: Record<string, CespCategory> = {}): CespCategory | null {
    const resolved = extraAliases[category] ?? CATEGORY_ALIASES[category] ?? category;
    return isCespCategory(resolved) ? resolved : null;
}

/**
 * Seedable generator (mulberry32) so picks are reproducible
 */
export function createSeededRandom(seed: number): RandomSource {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6D2B79F5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export class SoundSelector {
    private static instance: SoundSelector;

    private constructor() { }

    public static getInstance(): SoundSelector {
        if (!SoundSelector.instance) {
            SoundSelector.instance = new SoundSelector();
        }
        return SoundSelector.instance;
    }

    /**
     * Pick a sound for `category`, recording the chosen index in `state`.
     * The caller persists the state. Returns null when the pack has nothing for it.
     */
    public pick(
        category: string,
        manifest: PackManifest,
        state: PersistedState,
        random: RandomSource = Math.random
    ): SoundEntry | null {
        const resolved = resolveCategory(category, manifest.aliases);
        if (!resolved) {
            return null;
        }

        const sounds = manifest.categories[resolved];
        if (!sounds || sounds.length === 0) {
            return null;
        }

        if (sounds.length === 1) {
            state.last_sound_index[resolved] = 0;
            return sounds[0];
        }

        const last = state.last_sound_index[resolved];
        const candidates: number[] = [];
        for (let i = 0; i < sounds.length; i++) {
            if (i !== last) candidates.push(i);
        }

        const roll = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
        const index = candidates[roll];
        state.last_sound_index[resolved] = index;
        return sounds[index];
    }
}

export const soundSelector = SoundSelector.getInstance();
