/**
 * Per-invocation wiring: config, active pack, manifest and router
 */

import * as path from 'path';
import { ConfigStore } from './config.js';
import { StateStore } from './state.js';
import { PackLoader, loadManifestFromDir, mergeManifests } from './packs.js';
import { EventRouter } from './router.js';
import { SystemEffects, resolveIconPath } from './effects.js';
import { resolveProjectName } from './git.js';
import type { RandomSource } from './sound.js';
import type { EffectSink } from './types.js';
import { debugLog } from './log.js';

export interface RouterSetup {
    peonDir: string;
    directory: string;
    sessionId?: string;
    effects?: EffectSink;
    clock?: () => Date;
    random?: RandomSource;
}

/**
 * Build a router for the active pack, or null when peon-ping is disabled or
 * no usable pack is installed
 */
export async function createRouter(setup: RouterSetup): Promise<EventRouter | null> {
    const config = await new ConfigStore(setup.peonDir).load();
    if (!config.enabled) {
        return null;
    }

    const store = new StateStore(setup.peonDir);
    const packLoader = new PackLoader(path.join(setup.peonDir, 'packs'));
    const state = await store.load();
    const before = JSON.stringify({ pack: state.active_pack, sessions: state.session_packs });
    const packName = await packLoader.resolveActivePack(config, state, setup.sessionId, setup.random);
    if (JSON.stringify({ pack: state.active_pack, sessions: state.session_packs }) !== before) {
        await store.save(state);
    }

    const packManifest = await packLoader.loadManifest(packName);
    if (!packManifest) {
        debugLog(`No usable manifest for pack "${packName}"`);
        return null;
    }
    // Trainer sounds ship separately and only fill categories the pack lacks
    const manifest = mergeManifests(packManifest, await loadManifestFromDir(path.join(setup.peonDir, 'trainer')));

    return new EventRouter({
        config,
        manifest,
        store,
        effects: setup.effects ?? new SystemEffects(setup.peonDir),
        projectName: await resolveProjectName(setup.directory),
        iconPath: resolveIconPath(setup.peonDir),
        clock: setup.clock,
        random: setup.random
    });
}
