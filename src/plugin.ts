/**
 * peon-ping in-process adapter
 * For hosts that load a module once per session and push events into it.
 * Plays the session.start signal shortly after loading, then routes every
 * pushed event through a fresh state load like the CLI hook does.
 */

import { v4 as uuidv4 } from 'uuid';
import { resolvePeonDir } from './config.js';
import { createRouter } from './bootstrap.js';
import { parseHookEvent, scheduleStartupSignal } from './router.js';
import type { RandomSource } from './sound.js';
import type { EffectSink } from './types.js';

export interface PeonPluginOptions {
    directory?: string;
    peonDir?: string;
    effects?: EffectSink;
    clock?: () => Date;
    random?: RandomSource;
    startupDelayMs?: number;
}

export interface PeonPluginHooks {
    event?: (input: { event: unknown }) => Promise<void>;
}

/**
 * Create the adapter. Returns no hooks when peon-ping is disabled or no pack is installed.
 */
export async function createPeonPlugin(options: PeonPluginOptions = {}): Promise<PeonPluginHooks> {
    const router = await createRouter({
        peonDir: options.peonDir ?? resolvePeonDir(),
        directory: options.directory ?? process.cwd(),
        sessionId: `plugin-${uuidv4()}`,
        effects: options.effects,
        clock: options.clock,
        random: options.random
    });
    if (!router) {
        return {};
    }

    scheduleStartupSignal(router, options.startupDelayMs ?? 100);

    return {
        event: async ({ event }) => {
            const parsed = parseHookEvent(event);
            if (parsed) {
                await router.handle(parsed);
            }
        }
    };
}

export { EventRouter, parseHookEvent, scheduleStartupSignal } from './router.js';
export { StateStore } from './state.js';
export { ConfigStore } from './config.js';
export { TrainerCommands } from './commands.js';
export { createSeededRandom } from './sound.js';
export type { HookEvent, EffectSink, NotifyOptions, PeonConfig, PersistedState } from './types.js';
export default createPeonPlugin;
