/**
 * peon-ping Trainer Commands
 * load -> mutate -> save wrappers around the trainer scheduler, formatted for
 * people. Shared by the CLI and the MCP server.
 */

import { ConfigStore } from './config.js';
import { StateStore } from './state.js';
import { localDateString, trainerScheduler } from './trainer.js';
import { InvalidCountError, UnknownExerciseError } from './types.js';
import type { TrainerStatus } from './types.js';

export interface TrainerCommandsOptions {
    peonDir: string;
    clock?: () => Date;
}

/**
 * Turn any thrown value into a single user-facing line
 */
export function formatError(error: unknown): string {
    if (error instanceof UnknownExerciseError || error instanceof InvalidCountError) {
        return `❌ ${error.message}`;
    }
    if (error instanceof Error) {
        return `❌ Error: ${error.message}`;
    }
    return '❌ Unknown error occurred';
}

/**
 * True for the errors caused by bad user input
 */
export function isValidationError(error: unknown): boolean {
    return error instanceof UnknownExerciseError || error instanceof InvalidCountError;
}

export function formatStatus(status: TrainerStatus, enabled: boolean): string {
    const lines = [`Trainer ${enabled ? 'on' : 'off'} (${status.date})`];
    const names = Object.keys(status.goals);
    if (names.length === 0) {
        lines.push('  No exercises configured.');
    }
    for (const exercise of names) {
        const reps = status.reps[exercise] ?? 0;
        const goal = status.goals[exercise];
        lines.push(`  ${exercise}: ${reps}/${goal}${goal > 0 && reps >= goal ? ' ✅' : ''}`);
    }
    if (names.length > 0 && status.complete) {
        lines.push('Daily goal complete!');
    }
    return lines.join('\n');
}

export class TrainerCommands {
    private readonly configStore: ConfigStore;
    private readonly stateStore: StateStore;
    private readonly clock: () => Date;

    constructor(options: TrainerCommandsOptions) {
        this.configStore = new ConfigStore(options.peonDir);
        this.stateStore = new StateStore(options.peonDir);
        this.clock = options.clock ?? (() => new Date());
    }

    private today(): string {
        return localDateString(this.clock());
    }

    /**
     * Today's progress. A day rollover found here is written back.
     */
    public async status(): Promise<string> {
        const config = await this.configStore.load();
        const state = await this.stateStore.load();
        const changed = trainerScheduler.rollover(state, config.trainer, this.today());
        if (changed) {
            await this.stateStore.save(state);
        }
        const status = trainerScheduler.status(state, config.trainer, this.today());
        return formatStatus(status, config.trainer.enabled);
    }

    /**
     * Log reps of one exercise
     */
    public async log(count: string | number, exercise: string): Promise<string> {
        const config = await this.configStore.load();
        const state = await this.stateStore.load();
        const total = trainerScheduler.log(state, config.trainer, exercise, count, this.today());
        await this.stateStore.save(state);

        const goal = config.trainer.exercises[exercise];
        const reached = goal > 0 && total >= goal ? ' (goal reached)' : '';
        return `${exercise}: ${total}/${goal}${reached}`;
    }

    /**
     * Set one exercise's goal, or every exercise's goal when `exercise` is omitted
     */
    public async goal(exercise: string | undefined, value: string | number): Promise<string> {
        const config = await this.configStore.load();
        const goals = trainerScheduler.setGoal(config.trainer, exercise, value);
        await this.configStore.save(config);

        const shown = exercise !== undefined ? [exercise] : Object.keys(goals);
        const summary = shown.map(name => `${name}=${goals[name]}`).join(', ');
        return shown.length === 1 ? `Goal set: ${summary}` : `Goals set: ${summary || '(no exercises)'}`;
    }

    /**
     * Turn reminders on or off
     */
    public async setEnabled(enabled: boolean): Promise<string> {
        const config = await this.configStore.load();
        config.trainer.enabled = enabled;
        await this.configStore.save(config);
        return `Trainer ${enabled ? 'enabled' : 'disabled'}`;
    }
}
