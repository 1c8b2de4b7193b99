/**
 * peon-ping Config Store
 * Reads config.json with per-field defaults and writes it back for the
 * trainer and pack commands
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { PeonConfig, TrainerConfig } from './types.js';
import { writeJsonAtomic } from './state.js';
import { debugLog } from './log.js';

const CONFIG_FILE = 'config.json';

/**
 * Resolve the directory holding config, state, the pause marker and packs
 */
export function resolvePeonDir(): string {
    const fromEnv = process.env.PEON_PING_DIR;
    if (fromEnv && fromEnv.trim().length > 0) {
        return fromEnv;
    }
    return path.join(os.homedir(), '.config', 'peon-ping');
}

function defaultTrainerConfig(): TrainerConfig {
    return {
        enabled: false,
        exercises: { pushups: 300, squats: 300 },
        reminder_interval_seconds: 1200
    };
}

/**
 * Create the default configuration
 */
export function createDefaultConfig(): PeonConfig {
    return {
        enabled: true,
        volume: 0.5,
        active_pack: 'peon',
        pack_rotation: [],
        categories: {},
        desktop_notifications: true,
        debounce_ms: 500,
        spam_threshold: 3,
        spam_window_seconds: 10,
        trainer: defaultTrainerConfig()
    };
}

const defaults = createDefaultConfig();

const TrainerConfigSchema = z.object({
    enabled: z.boolean().catch(defaults.trainer.enabled),
    exercises: z.record(z.string(), z.number().int().nonnegative()).catch(() => defaultTrainerConfig().exercises),
    reminder_interval_seconds: z.number().int().positive().catch(defaults.trainer.reminder_interval_seconds)
});

// A non-boolean toggle is dropped on its own; the rest of the map stays
const CategoryTogglesSchema = z.record(z.string(), z.unknown())
    .transform(toggles => Object.fromEntries(
        Object.entries(toggles).filter((entry): entry is [string, boolean] => typeof entry[1] === 'boolean')
    ))
    .catch(() => ({}));

const PeonConfigSchema = z.object({
    enabled: z.boolean().catch(defaults.enabled),
    volume: z.number().min(0).max(1).catch(defaults.volume),
    active_pack: z.string().min(1).catch(defaults.active_pack),
    pack_rotation: z.array(z.string()).catch(() => []),
    categories: CategoryTogglesSchema,
    desktop_notifications: z.boolean().catch(defaults.desktop_notifications),
    debounce_ms: z.number().int().nonnegative().catch(defaults.debounce_ms),
    spam_threshold: z.number().int().positive().catch(defaults.spam_threshold),
    spam_window_seconds: z.number().int().positive().catch(defaults.spam_window_seconds),
    trainer: TrainerConfigSchema.catch(() => defaultTrainerConfig())
}).passthrough(); // Keys this version does not know survive a rewrite

/**
 * Validate arbitrary parsed JSON into a config, field by field
 */
export function parseConfig(raw: unknown): PeonConfig {
    const result = PeonConfigSchema.safeParse(raw);
    if (!result.success) {
        return createDefaultConfig();
    }
    return result.data;
}

/**
 * ConfigStore owns config.json
 */
export class ConfigStore {
    private configFile: string;

    constructor(peonDir: string) {
        this.configFile = path.join(peonDir, CONFIG_FILE);
    }

    public getConfigFilePath(): string {
        return this.configFile;
    }

    public async load(): Promise<PeonConfig> {
        try {
            const data = await fs.readFile(this.configFile, 'utf-8');
            return parseConfig(JSON.parse(data));
        } catch (error) {
            debugLog(`Using default config (${this.configFile} unreadable)`, error);
            return createDefaultConfig();
        }
    }

    public async save(config: PeonConfig): Promise<void> {
        await writeJsonAtomic(this.configFile, config);
    }
}
