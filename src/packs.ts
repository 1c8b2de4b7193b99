/**
 * peon-ping Pack Loader
 * Finds installed sound packs, picks the active one (with per-session rotation)
 * and loads its manifest.
 *
 * Two manifest formats are read:
 *   - openpeon.json (CESP): files relative to the pack root
 *   - manifest.json (legacy): legacy category names, files under sounds/
 * Both come out as a PackManifest keyed by CESP category with absolute file paths.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CESP_CATEGORIES } from './types.js';
import type { CespCategory, PackManifest, PeonConfig, PersistedState, SoundEntry } from './types.js';
import { resolveCategory } from './sound.js';
import type { RandomSource } from './sound.js';
import { debugLog } from './log.js';

const CESP_MANIFEST = 'openpeon.json';
const LEGACY_MANIFEST = 'manifest.json';

const SoundSchema = z.object({
    file: z.string().min(1),
    label: z.string().optional(),
    line: z.string().optional() // Legacy name for label
});

const ManifestSchema = z.object({
    name: z.string().optional(),
    display_name: z.string().optional(),
    categories: z.record(z.string(), z.object({
        sounds: z.array(z.unknown()).catch(() => [])
    }).catch(() => ({ sounds: [] }))).catch(() => ({})),
    category_aliases: z.record(z.string(), z.string()).catch(() => ({})).optional()
});

type ManifestFormat = 'cesp' | 'legacy';

export class PackLoader {
    private packsDir: string;

    constructor(packsDir: string) {
        this.packsDir = packsDir;
    }

    public getPackDir(packName: string): string {
        return path.join(this.packsDir, packName);
    }

    /**
     * Names of pack directories that carry a manifest, sorted
     */
    public async listInstalledPacks(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.packsDir);
        } catch (error) {
            debugLog(`No packs directory at ${this.packsDir}`, error);
            return [];
        }

        const installed: string[] = [];
        for (const entry of entries.sort()) {
            if (await findManifestFile(this.getPackDir(entry))) {
                installed.push(entry);
            }
        }
        return installed;
    }

    /**
     * Choose the pack for this invocation and record it in `state`.
     * With a rotation configured, a session keeps the pack it was first given.
     */
    public async resolveActivePack(
        config: PeonConfig,
        state: PersistedState,
        sessionId: string | undefined,
        random: RandomSource = Math.random
    ): Promise<string> {
        const installed = await this.listInstalledPacks();
        const rotation = config.pack_rotation.filter(name => installed.includes(name));

        let chosen: string;
        if (rotation.length > 0) {
            const remembered = sessionId ? state.session_packs[sessionId] : undefined;
            if (remembered && rotation.includes(remembered)) {
                chosen = remembered;
            } else {
                chosen = rotation[Math.min(Math.floor(random() * rotation.length), rotation.length - 1)];
                if (sessionId) {
                    state.session_packs[sessionId] = chosen;
                }
            }
        } else if (installed.includes(config.active_pack) || installed.length === 0) {
            chosen = config.active_pack;
        } else {
            chosen = installed[0];
        }

        state.active_pack = chosen;
        return chosen;
    }

    /**
     * Load a pack's manifest, or null when it has none or it is unreadable
     */
    public async loadManifest(packName: string): Promise<PackManifest | null> {
        return loadManifestFromDir(this.getPackDir(packName));
    }
}

async function findManifestFile(packDir: string): Promise<{ file: string; format: ManifestFormat } | null> {
    const candidates: Array<{ file: string; format: ManifestFormat }> = [
        { file: path.join(packDir, CESP_MANIFEST), format: 'cesp' },
        { file: path.join(packDir, LEGACY_MANIFEST), format: 'legacy' }
    ];
    for (const candidate of candidates) {
        try {
            const stat = await fs.stat(candidate.file);
            if (stat.isFile()) return candidate;
        } catch {
            // Not present, try the next format
        }
    }
    return null;
}

/**
 * Load and normalize the manifest found in `packDir`
 */
export async function loadManifestFromDir(packDir: string): Promise<PackManifest | null> {
    const found = await findManifestFile(packDir);
    if (!found) {
        return null;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(found.file, 'utf-8'));
    } catch (error) {
        debugLog(`Unreadable manifest ${found.file}`, error);
        return null;
    }

    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
        debugLog(`Invalid manifest ${found.file}`, parsed.error);
        return null;
    }

    const packName = path.basename(packDir);
    const aliases: Record<string, CespCategory> = {};
    for (const [legacy, target] of Object.entries(parsed.data.category_aliases ?? {})) {
        const resolved = resolveCategory(target);
        if (resolved) aliases[legacy] = resolved;
    }

    const categories: Partial<Record<CespCategory, SoundEntry[]>> = {};
    for (const [name, entry] of Object.entries(parsed.data.categories)) {
        const category = resolveCategory(name, aliases);
        if (!category) {
            continue;
        }
        const sounds = entry.sounds
            .map(sound => toSoundEntry(packDir, sound, found.format))
            .filter((sound): sound is SoundEntry => sound !== null);
        categories[category] = [...(categories[category] ?? []), ...sounds];
    }

    return {
        name: parsed.data.name ?? packName,
        displayName: parsed.data.display_name ?? parsed.data.name ?? packName,
        categories,
        aliases
    };
}

function toSoundEntry(packDir: string, raw: unknown, format: ManifestFormat): SoundEntry | null {
    const result = SoundSchema.safeParse(raw);
    if (!result.success) {
        return null;
    }

    const { file, label, line } = result.data;
    const relative = format === 'legacy' && !file.includes('/') ? path.join('sounds', file) : file;
    const resolved = path.resolve(packDir, relative);

    // Manifest entries may not point outside their pack
    if (!resolved.startsWith(path.resolve(packDir) + path.sep)) {
        return null;
    }

    return { file: resolved, label: label ?? line ?? '' };
}

/**
 * Fill categories missing from `primary` with those of `extra`
 */
export function mergeManifests(primary: PackManifest, extra: PackManifest | null): PackManifest {
    if (!extra) {
        return primary;
    }
    const categories: Partial<Record<CespCategory, SoundEntry[]>> = { ...extra.categories };
    for (const category of CESP_CATEGORIES) {
        const sounds = primary.categories[category];
        if (sounds && sounds.length > 0) {
            categories[category] = sounds;
        }
    }
    return { ...primary, categories };
}
