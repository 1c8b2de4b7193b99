/**
 * peon-ping Event Router
 * Maps assistant lifecycle events to CESP categories and sequences the gates:
 * tab title -> spam re-route -> debounce -> trainer reminder -> sound -> notification.
 *
 * Event to category mapping:
 *
 * | Event                            | Category          |
 * |----------------------------------|-------------------|
 * | session.start / session.created  | session.start     |
 * | session.status (busy / running)  | task.acknowledge  |
 * | session.idle                     | task.complete     |
 * | session.error                    | task.error        |
 * | permission.asked                 | input.required    |
 * | rapid prompts detected           | user.spam         |
 * | trainer reminder due             | trainer.remind    |
 */

import { z } from 'zod';
import type {
    CespCategory,
    EffectSink,
    HookEvent,
    PackManifest,
    PeonConfig,
    PersistedState,
    SoundEntry
} from './types.js';
import type { StateStore } from './state.js';
import { debounceGate } from './debounce.js';
import { spamDetector } from './spam.js';
import { soundSelector } from './sound.js';
import type { RandomSource } from './sound.js';
import { localDateString, trainerScheduler } from './trainer.js';
import { debugLog } from './log.js';

const ATTENTION_MARKER = '● ';

export interface Route {
    category: CespCategory;
    status: string;
    marker?: string;
    notifyTitle?: (projectName: string) => string;
    spamCheck?: boolean;
}

interface Emission {
    category: CespCategory;
    marker: string;
    notifyTitle?: string;
    subtitle?: string;
}

const SESSION_START_ROUTE: Route = { category: 'session.start', status: 'ready' };

/**
 * Static route for an event, or null when the event has no reaction
 */
export function routeFor(event: HookEvent): Route | null {
    switch (event.type) {
        case 'session.start':
        case 'session.created':
            return SESSION_START_ROUTE;
        case 'session.idle':
            return {
                category: 'task.complete',
                status: 'done',
                marker: ATTENTION_MARKER,
                notifyTitle: project => `${project} — Task complete`
            };
        case 'session.error':
            return {
                category: 'task.error',
                status: 'error',
                marker: ATTENTION_MARKER,
                notifyTitle: project => `${project} — Error occurred`
            };
        case 'permission.asked':
            return {
                category: 'input.required',
                status: 'needs approval',
                marker: ATTENTION_MARKER,
                notifyTitle: project => `${project} — Permission needed`
            };
        case 'session.status': {
            const status = event.properties.status;
            if (status === 'busy' || status === 'running') {
                return { category: 'task.acknowledge', status: 'working', spamCheck: true };
            }
            return null;
        }
        case 'message.updated':
            return null;
    }
}

const SessionId = z.string().optional();

const HookEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('session.start'), sessionId: SessionId }),
    z.object({ type: z.literal('session.created'), sessionId: SessionId }),
    z.object({ type: z.literal('session.idle'), sessionId: SessionId }),
    z.object({ type: z.literal('session.error'), sessionId: SessionId }),
    z.object({ type: z.literal('permission.asked'), sessionId: SessionId }),
    z.object({
        type: z.literal('session.status'),
        sessionId: SessionId,
        properties: z.object({ status: z.string() })
    }),
    z.object({
        type: z.literal('message.updated'),
        sessionId: SessionId,
        properties: z.object({ role: z.string() })
    })
]);

/**
 * Validate a raw event payload; anything unrecognized yields null
 */
export function parseHookEvent(raw: unknown): HookEvent | null {
    const result = HookEventSchema.safeParse(raw);
    return result.success ? result.data : null;
}

export interface EventRouterOptions {
    config: PeonConfig;
    manifest: PackManifest;
    store: StateStore;
    effects: EffectSink;
    projectName: string;
    iconPath?: string;
    clock?: () => Date;
    random?: RandomSource;
}

/**
 * EventRouter handles one event per call against freshly loaded state
 */
export class EventRouter {
    private readonly config: PeonConfig;
    private readonly manifest: PackManifest;
    private readonly store: StateStore;
    private readonly effects: EffectSink;
    private readonly projectName: string;
    private readonly iconPath?: string;
    private readonly clock: () => Date;
    private readonly random: RandomSource;

    constructor(options: EventRouterOptions) {
        this.config = options.config;
        this.manifest = options.manifest;
        this.store = options.store;
        this.effects = options.effects;
        this.projectName = options.projectName;
        this.iconPath = options.iconPath;
        this.clock = options.clock ?? (() => new Date());
        this.random = options.random ?? Math.random;
    }

    /**
     * React to a single event. Never throws: every failure only drops its own side effect.
     */
    public async handle(event: HookEvent): Promise<void> {
        try {
            await this.route(event);
        } catch (error) {
            debugLog(`Handling ${event.type} failed`, error);
        }
    }

    private async route(event: HookEvent): Promise<void> {
        if (!this.config.enabled) {
            return;
        }

        const nowDate = this.clock();
        const now = nowDate.getTime() / 1000;

        if (event.type === 'message.updated') {
            if (event.properties.role === 'user') {
                const state = await this.store.load();
                spamDetector.recordAndCheck(state, this.config, now);
                await this.persist(state);
            }
            return;
        }

        const route = routeFor(event);
        if (!route) {
            return;
        }

        const marker = route.marker ?? '';
        this.safely('setTitle', () => this.effects.setTitle(`${marker}${this.projectName}: ${route.status}`));

        const state = await this.store.load();

        let category = route.category;
        if (route.spamCheck && spamDetector.recordAndCheck(state, this.config, now)) {
            category = 'user.spam';
        }

        if (debounceGate.shouldSkip(state, category, now, this.config.debounce_ms)) {
            await this.persist(state);
            return;
        }

        const emissions: Emission[] = [{
            category,
            marker,
            notifyTitle: route.notifyTitle?.(this.projectName)
        }];

        const today = localDateString(nowDate);
        if (trainerScheduler.reminderDue(state, this.config.trainer, event.type, now, today)
            && !debounceGate.shouldSkip(state, 'trainer.remind', now, this.config.debounce_ms)) {
            emissions.push({
                category: 'trainer.remind',
                marker,
                notifyTitle: `${this.projectName} — Time to move`,
                subtitle: trainerScheduler.describeProgress(state, this.config.trainer)
            });
        }

        await this.persist(state);

        const paused = this.safely('isPaused', () => this.effects.isPaused()) === true;
        for (const emission of emissions) {
            await this.emit(emission, state, paused);
        }
    }

    /**
     * Play and notify for one category
     */
    private async emit(emission: Emission, state: PersistedState, paused: boolean): Promise<void> {
        let picked: SoundEntry | null = null;
        if (!paused && this.config.categories[emission.category] !== false) {
            picked = soundSelector.pick(emission.category, this.manifest, state, this.random);
            if (picked) {
                await this.persist(state);
                const file = picked.file;
                this.safely('play', () => this.effects.play(file, this.config.volume));
            }
        }

        if (!emission.notifyTitle || paused || !this.config.desktop_notifications) {
            return;
        }
        const title = emission.notifyTitle;
        const focused = this.safely('isTerminalFocused', () => this.effects.isTerminalFocused());
        // An unanswerable focus query counts as focused: no notification
        if (focused !== false) {
            return;
        }

        const body = picked?.label
            ? `🗣 "${picked.label}"`
            : `${emission.marker}${this.projectName}`;
        this.safely('notify', () => this.effects.notify({
            title,
            subtitle: emission.subtitle ?? this.manifest.displayName,
            body,
            group: `peon-ping-${this.projectName}`,
            iconPath: this.iconPath
        }));
    }

    private async persist(state: PersistedState): Promise<void> {
        try {
            await this.store.save(state);
        } catch (error) {
            debugLog('Saving state failed', error);
        }
    }

    /**
     * Run a delegate call, turning a throw into `undefined`
     */
    private safely<T>(what: string, call: () => T): T | undefined {
        try {
            return call();
        } catch (error) {
            debugLog(`Effect ${what} failed`, error);
            return undefined;
        }
    }
}

/**
 * Fire one session.start after `delayMs`, without blocking the caller.
 * There is no cancellation: if the process exits first, the signal never plays.
 */
export function scheduleStartupSignal(router: EventRouter, delayMs = 100): void {
    setTimeout(() => {
        router.handle({ type: 'session.start' }).catch(error => debugLog('Startup signal failed', error));
    }, delayMs);
}
