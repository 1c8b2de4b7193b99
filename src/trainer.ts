/**
 * peon-ping Trainer Scheduler
 * Daily exercise-rep tracker with goal evaluation and interval-gated reminders.
 *
 * Reps are keyed by the local calendar day in `state.trainer.date`. Any access
 * under a different day first resets every configured exercise to zero; goals
 * live in config and are never touched by the rollover.
 */

import { InvalidCountError, UnknownExerciseError } from './types.js';
import type { HookEventType, PersistedState, TrainerConfig, TrainerStatus } from './types.js';

/**
 * Events after which a reminder may fire: the assistant stopped and the user is waiting
 */
export const REMINDER_ELIGIBLE_EVENTS: ReadonlySet<HookEventType> = new Set<HookEventType>(['session.idle']);

/**
 * Format a date as local "YYYY-MM-DD"
 */
export function localDateString(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Parse a rep count or goal; only plain non-negative integers are accepted
 */
export function parseCount(value: string | number): number {
    if (typeof value === 'number') {
        if (Number.isSafeInteger(value) && value >= 0) {
            return value;
        }
        throw new InvalidCountError(String(value));
    }

    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new InvalidCountError(value);
    }
    const parsed = Number(trimmed);
    if (!Number.isSafeInteger(parsed)) {
        throw new InvalidCountError(value);
    }
    return parsed;
}

export class TrainerScheduler {
    private static instance: TrainerScheduler;

    private constructor() { }

    public static getInstance(): TrainerScheduler {
        if (!TrainerScheduler.instance) {
            TrainerScheduler.instance = new TrainerScheduler();
        }
        return TrainerScheduler.instance;
    }

    /**
     * Bring `state.trainer` to `today`: reset reps on a new day and keep the rep
     * keys aligned with the configured exercises.
     * Returns true when the state changed.
     */
    public rollover(state: PersistedState, trainer: TrainerConfig, today: string): boolean {
        const current = state.trainer;
        const newDay = current.date !== today;
        const reps: Record<string, number> = {};
        for (const exercise of Object.keys(trainer.exercises)) {
            reps[exercise] = newDay ? 0 : (current.reps[exercise] ?? 0);
        }

        const changed = newDay || !sameReps(current.reps, reps);
        state.trainer = {
            date: today,
            reps,
            last_reminder_ts: current.last_reminder_ts
        };
        return changed;
    }

    /**
     * Add `count` reps of `exercise` to today's total and return the new total.
     * Nothing is mutated when validation fails.
     */
    public log(
        state: PersistedState,
        trainer: TrainerConfig,
        exercise: string,
        count: string | number,
        today: string
    ): number {
        this.assertKnownExercise(trainer, exercise);
        const reps = parseCount(count);

        this.rollover(state, trainer, today);
        const total = (state.trainer.reps[exercise] ?? 0) + reps;
        state.trainer.reps[exercise] = total;
        return total;
    }

    /**
     * Today's reps against goals
     */
    public status(state: PersistedState, trainer: TrainerConfig, today: string): TrainerStatus {
        this.rollover(state, trainer, today);
        return {
            date: state.trainer.date,
            reps: { ...state.trainer.reps },
            goals: { ...trainer.exercises },
            complete: this.isGoalMet(state, trainer)
        };
    }

    /**
     * Set the daily goal of one exercise, or of every configured exercise when
     * none is named. Mutates the trainer config, not the state.
     */
    public setGoal(trainer: TrainerConfig, exercise: string | undefined, value: string | number): Record<string, number> {
        if (exercise !== undefined) {
            this.assertKnownExercise(trainer, exercise);
        }
        const goal = parseCount(value);

        if (exercise !== undefined) {
            trainer.exercises[exercise] = goal;
        } else {
            for (const name of Object.keys(trainer.exercises)) {
                trainer.exercises[name] = goal;
            }
        }
        return { ...trainer.exercises };
    }

    /**
     * True when every exercise with a positive goal has reached it
     */
    public isGoalMet(state: PersistedState, trainer: TrainerConfig): boolean {
        return Object.entries(trainer.exercises)
            .filter(([, goal]) => goal > 0)
            .every(([exercise, goal]) => (state.trainer.reps[exercise] ?? 0) >= goal);
    }

    /**
     * Decide whether a reminder fires for `eventType` at `now` (epoch seconds).
     * A due reminder is consumed by this call: last_reminder_ts moves to `now`.
     */
    public reminderDue(
        state: PersistedState,
        trainer: TrainerConfig,
        eventType: HookEventType,
        now: number,
        today: string
    ): boolean {
        if (!trainer.enabled || !REMINDER_ELIGIBLE_EVENTS.has(eventType)) {
            return false;
        }

        this.rollover(state, trainer, today);
        if (this.isGoalMet(state, trainer)) {
            return false;
        }
        if (now - state.trainer.last_reminder_ts < trainer.reminder_interval_seconds) {
            return false;
        }

        state.trainer.last_reminder_ts = now;
        return true;
    }

    /**
     * One line of progress, e.g. "pushups 25/300, squats 0/300"
     */
    public describeProgress(state: PersistedState, trainer: TrainerConfig): string {
        return Object.entries(trainer.exercises)
            .map(([exercise, goal]) => `${exercise} ${state.trainer.reps[exercise] ?? 0}/${goal}`)
            .join(', ');
    }

    private assertKnownExercise(trainer: TrainerConfig, exercise: string): void {
        if (!Object.prototype.hasOwnProperty.call(trainer.exercises, exercise)) {
            throw new UnknownExerciseError(exercise, Object.keys(trainer.exercises));
        }
    }
}

function sameReps(a: Record<string, number>, b: Record<string, number>): boolean {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    return aKeys.length === bKeys.length && aKeys.every(key => a[key] === b[key]);
}

export const trainerScheduler = TrainerScheduler.getInstance();
