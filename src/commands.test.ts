import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TrainerCommands, formatError, formatStatus, isValidationError } from './commands.js';
import { ConfigStore } from './config.js';
import { StateStore } from './state.js';
import { InvalidCountError, UnknownExerciseError } from './types.js';

const clock = () => new Date(2026, 2, 2, 9, 30, 0);

describe('formatError', () => {
    it('shows validation errors as-is', () => {
        expect(formatError(new InvalidCountError('x'))).toBe('❌ Invalid count "x": expected a non-negative integer');
    });

    it('prefixes other errors', () => {
        expect(formatError(new Error('disk full'))).toBe('❌ Error: disk full');
    });

    it('handles values that are not errors', () => {
        expect(formatError('boom')).toBe('❌ Unknown error occurred');
    });
});

describe('isValidationError', () => {
    it('recognizes bad user input only', () => {
        expect(isValidationError(new UnknownExerciseError('burpees', []))).toBe(true);
        expect(isValidationError(new InvalidCountError('-1'))).toBe(true);
        expect(isValidationError(new Error('other'))).toBe(false);
    });
});

describe('formatStatus', () => {
    it('marks reached goals and a completed day', () => {
        const text = formatStatus({
            date: '2026-03-02',
            reps: { pushups: 50, squats: 20 },
            goals: { pushups: 50, squats: 20 },
            complete: true
        }, true);

        expect(text).toBe([
            'Trainer on (2026-03-02)',
            '  pushups: 50/50 ✅',
            '  squats: 20/20 ✅',
            'Daily goal complete!'
        ].join('\n'));
    });

    it('says so when no exercises are configured', () => {
        expect(formatStatus({ date: '2026-03-02', reps: {}, goals: {}, complete: true }, false))
            .toBe('Trainer off (2026-03-02)\n  No exercises configured.');
    });
});

describe('TrainerCommands', () => {
    let peonDir: string;
    let commands: TrainerCommands;

    beforeEach(async () => {
        peonDir = await fs.mkdtemp(path.join(os.tmpdir(), 'peon-ping-commands-'));
        commands = new TrainerCommands({ peonDir, clock });
    });

    afterEach(async () => {
        await fs.rm(peonDir, { recursive: true, force: true });
    });

    it('logs reps and persists them', async () => {
        expect(await commands.log('25', 'pushups')).toBe('pushups: 25/300');
        expect(await commands.log(40, 'pushups')).toBe('pushups: 65/300');

        const state = await new StateStore(peonDir).load();
        expect(state.trainer).toEqual({ date: '2026-03-02', reps: { pushups: 65, squats: 0 }, last_reminder_ts: 0 });
    });

    it('notes when a goal is reached', async () => {
        await commands.goal('squats', 10);
        expect(await commands.log(12, 'squats')).toBe('squats: 12/10 (goal reached)');
    });

    it('leaves state untouched on a bad log', async () => {
        await expect(commands.log('many', 'pushups')).rejects.toThrow(InvalidCountError);
        await expect(commands.log(5, 'burpees')).rejects.toThrow(UnknownExerciseError);
        await expect(fs.access(new StateStore(peonDir).getStateFilePath())).rejects.toThrow();
    });

    it('sets all goals or one goal', async () => {
        expect(await commands.goal(undefined, '200')).toBe('Goals set: pushups=200, squats=200');
        expect(await commands.goal('pushups', '100')).toBe('Goal set: pushups=100');

        const config = await new ConfigStore(peonDir).load();
        expect(config.trainer.exercises).toEqual({ pushups: 100, squats: 200 });
    });

    it('toggles reminders', async () => {
        expect(await commands.setEnabled(true)).toBe('Trainer enabled');
        expect((await new ConfigStore(peonDir).load()).trainer.enabled).toBe(true);
        expect(await commands.setEnabled(false)).toBe('Trainer disabled');
        expect((await new ConfigStore(peonDir).load()).trainer.enabled).toBe(false);
    });

    it('reports status and writes back a day rollover', async () => {
        await new StateStore(peonDir).save({
            last_play_ts: {},
            last_sound_index: {},
            recent_message_ts: [],
            active_pack: 'peon',
            session_packs: {},
            trainer: { date: '2026-03-01', reps: { pushups: 120, squats: 40 }, last_reminder_ts: 0 }
        });

        expect(await commands.status()).toBe([
            'Trainer off (2026-03-02)',
            '  pushups: 0/300',
            '  squats: 0/300'
        ].join('\n'));

        const state = await new StateStore(peonDir).load();
        expect(state.trainer.date).toBe('2026-03-02');
        expect(state.trainer.reps).toEqual({ pushups: 0, squats: 0 });
    });
});
