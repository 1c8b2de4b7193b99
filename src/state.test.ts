import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StateStore, createDefaultState, parseState, writeJsonAtomic } from './state.js';

describe('StateStore', () => {
    let peonDir: string;

    beforeEach(async () => {
        peonDir = await fs.mkdtemp(path.join(os.tmpdir(), 'peon-ping-state-'));
    });

    afterEach(async () => {
        await fs.rm(peonDir, { recursive: true, force: true });
    });

    it('starts from defaults when no state file exists', async () => {
        const store = new StateStore(peonDir);
        expect(await store.load()).toEqual(createDefaultState());
    });

    it('starts from defaults when the state file is not JSON', async () => {
        const store = new StateStore(peonDir);
        await fs.writeFile(store.getStateFilePath(), '{ not json', 'utf-8');
        expect(await store.load()).toEqual(createDefaultState());
    });

    it('round-trips a saved state', async () => {
        const store = new StateStore(peonDir);
        const state = createDefaultState();
        state.last_play_ts['task.complete'] = 1700000000.5;
        state.last_sound_index['task.complete'] = 2;
        state.recent_message_ts = [1700000000, 1700000001];
        state.active_pack = 'peon';
        state.trainer = { date: '2026-03-01', reps: { pushups: 25 }, last_reminder_ts: 1700000000 };

        await store.save(state);
        expect(await store.load()).toEqual(state);
    });

    it('leaves no temp file behind after saving', async () => {
        const store = new StateStore(peonDir);
        await store.save(createDefaultState());
        expect(await fs.readdir(peonDir)).toEqual(['.state.json']);
    });

    it('keeps only the 50 most recent session pack entries', async () => {
        const store = new StateStore(peonDir);
        const state = createDefaultState();
        for (let i = 0; i < 60; i++) {
            state.session_packs[`session-${i}`] = 'peon';
        }

        await store.save(state);
        const loaded = await store.load();
        const keys = Object.keys(loaded.session_packs);
        expect(keys).toHaveLength(50);
        expect(keys[0]).toBe('session-10');
        expect(keys[49]).toBe('session-59');
    });
});

describe('parseState', () => {
    it('replaces only the field that is malformed', () => {
        const state = parseState({
            last_play_ts: 'oops',
            last_sound_index: { 'task.complete': 1 },
            recent_message_ts: [10, 20],
            active_pack: 'peon',
            session_packs: {},
            trainer: { date: '2026-03-01', reps: { pushups: 5 }, last_reminder_ts: 42 }
        });

        expect(state.last_play_ts).toEqual({});
        expect(state.last_sound_index).toEqual({ 'task.complete': 1 });
        expect(state.recent_message_ts).toEqual([10, 20]);
        expect(state.trainer).toEqual({ date: '2026-03-01', reps: { pushups: 5 }, last_reminder_ts: 42 });
    });

    it('fills fields missing from an older state file', () => {
        const state = parseState({ active_pack: 'glados' });
        expect(state).toEqual({ ...createDefaultState(), active_pack: 'glados' });
    });

    it('treats a non-object as an empty state', () => {
        expect(parseState(null)).toEqual(createDefaultState());
        expect(parseState([1, 2, 3])).toEqual(createDefaultState());
    });
});

describe('writeJsonAtomic', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'peon-ping-atomic-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('creates missing parent directories', async () => {
        const target = path.join(dir, 'nested', 'deeper', 'data.json');
        await writeJsonAtomic(target, { ok: true });
        expect(JSON.parse(await fs.readFile(target, 'utf-8'))).toEqual({ ok: true });
    });

    it('keeps overlapping saves in the same millisecond apart', async () => {
        vi.spyOn(Date, 'now').mockReturnValue(1_800_000_000_000);
        const target = path.join(dir, 'data.json');
        const large = { a: 'x'.repeat(5000) };
        const small = { b: 'y'.repeat(10) };

        for (let round = 0; round < 20; round++) {
            const results = await Promise.allSettled([
                writeJsonAtomic(target, large),
                writeJsonAtomic(target, small)
            ]);
            expect(results.map(result => result.status)).toEqual(['fulfilled', 'fulfilled']);
            expect([large, small]).toContainEqual(JSON.parse(await fs.readFile(target, 'utf-8')));
        }
        expect(await fs.readdir(dir)).toEqual(['data.json']);
    });

    it('replaces an existing file whole', async () => {
        const target = path.join(dir, 'data.json');
        await fs.writeFile(target, JSON.stringify({ old: 'value', extra: [1, 2, 3] }), 'utf-8');
        await writeJsonAtomic(target, { fresh: 1 });
        expect(JSON.parse(await fs.readFile(target, 'utf-8'))).toEqual({ fresh: 1 });
    });
});
