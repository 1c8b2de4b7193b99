/**
 * peon-ping Data Contracts
 * Defines the core data structures shared by the hook pipeline, the trainer and the CLI
 */

/**
 * CESP categories: the classes of coding-event reaction a sound pack can realize
 */
export const CESP_CATEGORIES = [
    'session.start',
    'session.end',
    'task.acknowledge',
    'task.complete',
    'task.error',
    'task.progress',
    'input.required',
    'resource.limit',
    'user.spam',
    'trainer.remind'
] as const;

export type CespCategory = typeof CESP_CATEGORIES[number];

/**
 * A single sound realizing a category
 * `file` is absolute once the manifest has been loaded
 */
export interface SoundEntry {
    file: string;
    label: string;
}

/**
 * A loaded sound pack, with legacy category names already folded into CESP ones
 */
export interface PackManifest {
    name: string;
    displayName: string;
    categories: Partial<Record<CespCategory, SoundEntry[]>>;
    aliases: Record<string, CespCategory>; // Pack-specific category_aliases
}

export interface TrainerConfig {
    enabled: boolean;
    exercises: Record<string, number>; // exercise -> daily goal
    reminder_interval_seconds: number;
}

/**
 * User configuration stored in config.json
 */
export interface PeonConfig {
    enabled: boolean;
    volume: number;
    active_pack: string;
    pack_rotation: string[];
    categories: Record<string, boolean>; // Explicit false disables a category
    desktop_notifications: boolean;
    debounce_ms: number;
    spam_threshold: number;
    spam_window_seconds: number;
    trainer: TrainerConfig;
}

export interface TrainerState {
    date: string; // Local "YYYY-MM-DD" the reps were counted under
    reps: Record<string, number>;
    last_reminder_ts: number; // Epoch seconds
}

/**
 * Cross-invocation memory stored in .state.json
 * Every timestamp is in epoch seconds
 */
export interface PersistedState {
    last_play_ts: Record<string, number>;
    last_sound_index: Record<string, number>;
    recent_message_ts: number[];
    active_pack: string;
    session_packs: Record<string, string>; // sessionId -> pack picked by rotation
    trainer: TrainerState;
}

/**
 * Lifecycle events emitted by the coding assistant
 */
export type HookEvent =
    | { type: 'session.start'; sessionId?: string }
    | { type: 'session.created'; sessionId?: string }
    | { type: 'session.idle'; sessionId?: string }
    | { type: 'session.error'; sessionId?: string }
    | { type: 'permission.asked'; sessionId?: string }
    | { type: 'session.status'; sessionId?: string; properties: { status: string } }
    | { type: 'message.updated'; sessionId?: string; properties: { role: string } };

export type HookEventType = HookEvent['type'];

/**
 * Rich desktop notification payload
 */
export interface NotifyOptions {
    title: string;
    subtitle?: string;
    body: string;
    group?: string; // Coalescing group (terminal-notifier only)
    iconPath?: string;
}

/**
 * One-way commands the router hands to the host
 * Production binds these to OS mechanisms, tests to in-memory call logs
 */
export interface EffectSink {
    play(filePath: string, volume: number): void;
    notify(options: NotifyOptions): void;
    setTitle(text: string): void;
    isTerminalFocused(): boolean;
    isPaused(): boolean;
}

/**
 * Today's trainer progress
 */
export interface TrainerStatus {
    date: string;
    reps: Record<string, number>;
    goals: Record<string, number>;
    complete: boolean;
}

/**
 * Error thrown when a trainer command names an exercise that is not configured
 */
export class UnknownExerciseError extends Error {
    constructor(
        public readonly exercise: string,
        public readonly knownExercises: string[]
    ) {
        super(
            `Unknown exercise "${exercise}". ` +
            `Known exercises: ${knownExercises.length > 0 ? knownExercises.join(', ') : '(none configured)'}`
        );
        this.name = 'UnknownExerciseError';
    }
}

/**
 * Error thrown when a trainer count or goal is not a non-negative integer
 */
export class InvalidCountError extends Error {
    constructor(public readonly value: string) {
        super(`Invalid count "${value}": expected a non-negative integer`);
        this.name = 'InvalidCountError';
    }
}
