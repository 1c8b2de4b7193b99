import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigStore, createDefaultConfig, parseConfig, resolvePeonDir } from './config.js';

describe('parseConfig', () => {
    it('returns defaults for an empty object', () => {
        expect(parseConfig({})).toEqual(createDefaultConfig());
    });

    it('falls back per field on bad values', () => {
        const config = parseConfig({
            volume: 3,
            debounce_ms: 250,
            spam_threshold: 'many',
            categories: { 'task.complete': false }
        });

        expect(config.volume).toBe(0.5);
        expect(config.debounce_ms).toBe(250);
        expect(config.spam_threshold).toBe(3);
        expect(config.categories).toEqual({ 'task.complete': false });
    });

    it('drops a malformed category toggle without re-enabling the others', () => {
        const config = parseConfig({
            categories: { 'task.complete': false, 'user.spam': 'false', 'session.start': true }
        });
        expect(config.categories).toEqual({ 'task.complete': false, 'session.start': true });
    });

    it('keeps trainer defaults when the trainer block is broken', () => {
        const config = parseConfig({ trainer: 'yes' });
        expect(config.trainer).toEqual({
            enabled: false,
            exercises: { pushups: 300, squats: 300 },
            reminder_interval_seconds: 1200
        });
    });

    it('does not share default objects between parses', () => {
        const first = parseConfig({});
        first.trainer.exercises.pushups = 1;
        first.pack_rotation.push('glados');

        const second = parseConfig({});
        expect(second.trainer.exercises.pushups).toBe(300);
        expect(second.pack_rotation).toEqual([]);
    });
});

describe('ConfigStore', () => {
    let peonDir: string;

    beforeEach(async () => {
        peonDir = await fs.mkdtemp(path.join(os.tmpdir(), 'peon-ping-config-'));
    });

    afterEach(async () => {
        await fs.rm(peonDir, { recursive: true, force: true });
    });

    it('loads defaults when config.json is missing', async () => {
        expect(await new ConfigStore(peonDir).load()).toEqual(createDefaultConfig());
    });

    it('loads defaults when config.json is corrupt', async () => {
        const store = new ConfigStore(peonDir);
        await fs.writeFile(store.getConfigFilePath(), 'volume = 1', 'utf-8');
        expect(await store.load()).toEqual(createDefaultConfig());
    });

    it('preserves unknown keys across a save', async () => {
        const store = new ConfigStore(peonDir);
        await fs.writeFile(store.getConfigFilePath(), JSON.stringify({ volume: 0.8, custom_key: 'kept' }), 'utf-8');

        const config = await store.load();
        config.trainer.enabled = true;
        await store.save(config);

        const written = JSON.parse(await fs.readFile(store.getConfigFilePath(), 'utf-8'));
        expect(written.custom_key).toBe('kept');
        expect(written.volume).toBe(0.8);
        expect(written.trainer.enabled).toBe(true);
    });
});

describe('resolvePeonDir', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('honours PEON_PING_DIR', () => {
        vi.stubEnv('PEON_PING_DIR', '/tmp/custom-peon');
        expect(resolvePeonDir()).toBe('/tmp/custom-peon');
    });

    it('defaults under the home directory', () => {
        vi.stubEnv('PEON_PING_DIR', '');
        expect(resolvePeonDir()).toBe(path.join(os.homedir(), '.config', 'peon-ping'));
    });
});
