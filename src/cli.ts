/**
 * peon-ping CLI
 *
 *   peon-ping hook [eventType [status]] react to one event (type argument or JSON on stdin)
 *   peon-ping trainer on|off|status
 *   peon-ping trainer log <count> <exercise>
 *   peon-ping trainer goal [<exercise>] <value>
 *   peon-ping pause|resume|toggle|status
 *   peon-ping mcp                       serve the trainer tools over stdio
 */

import { ConfigStore, resolvePeonDir } from './config.js';
import { parseHookEvent } from './router.js';
import { isPausedAt, setPaused } from './effects.js';
import { createRouter } from './bootstrap.js';
import { TrainerCommands, formatError, isValidationError } from './commands.js';
import { startMcpServer } from './mcp.js';
import type { EffectSink, HookEvent } from './types.js';
import { debugLog } from './log.js';

export interface CliIo {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    readStdin: () => Promise<string>;
}

export interface CliContext {
    peonDir?: string;
    cwd?: string;
    clock?: () => Date;
    effects?: EffectSink;
}

const USAGE = [
    'Usage:',
    '  peon-ping hook [eventType [status]]',
    '  peon-ping trainer on|off|status',
    '  peon-ping trainer log <count> <exercise>',
    '  peon-ping trainer goal [<exercise>] <value>',
    '  peon-ping pause|resume|toggle|status',
    '  peon-ping mcp'
].join('\n');

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(argv: string[], io: CliIo, context: CliContext = {}): Promise<number> {
    const peonDir = context.peonDir ?? resolvePeonDir();
    const [command, ...rest] = argv;

    switch (command) {
        case 'hook':
            await runHook(rest, io, context, peonDir);
            return 0;
        case 'trainer':
            return runTrainer(rest, io, new TrainerCommands({ peonDir, clock: context.clock }));
        case 'pause':
        case 'resume':
        case 'toggle': {
            const paused = command === 'pause' || (command === 'toggle' && !isPausedAt(peonDir));
            try {
                await setPaused(peonDir, paused);
            } catch (error) {
                io.stderr(formatError(error));
                return 1;
            }
            io.stdout(paused ? 'Sounds paused' : 'Sounds resumed');
            return 0;
        }
        case 'status': {
            const config = await new ConfigStore(peonDir).load();
            io.stdout([
                `peon-ping: ${isPausedAt(peonDir) ? 'paused' : 'active'}`,
                `Pack: ${config.active_pack}`,
                `Volume: ${config.volume}`,
                `Trainer: ${config.trainer.enabled ? 'on' : 'off'}`
            ].join('\n'));
            return 0;
        }
        case 'mcp':
            await startMcpServer(new TrainerCommands({ peonDir, clock: context.clock }));
            return 0;
        default:
            io.stderr(USAGE);
            return command === undefined || command === 'help' || command === '--help' ? 0 : 1;
    }
}

async function runTrainer(args: string[], io: CliIo, commands: TrainerCommands): Promise<number> {
    const [sub, ...rest] = args;
    try {
        switch (sub) {
            case 'on':
            case 'off':
                io.stdout(await commands.setEnabled(sub === 'on'));
                return 0;
            case 'status':
                io.stdout(await commands.status());
                return 0;
            case 'log': {
                if (rest.length !== 2) {
                    io.stderr('Usage: peon-ping trainer log <count> <exercise>');
                    return 1;
                }
                io.stdout(await commands.log(rest[0], rest[1]));
                return 0;
            }
            case 'goal': {
                if (rest.length === 1) {
                    io.stdout(await commands.goal(undefined, rest[0]));
                    return 0;
                }
                if (rest.length === 2) {
                    io.stdout(await commands.goal(rest[0], rest[1]));
                    return 0;
                }
                io.stderr('Usage: peon-ping trainer goal [<exercise>] <value>');
                return 1;
            }
            default:
                io.stderr(USAGE);
                return 1;
        }
    } catch (error) {
        io.stderr(formatError(error));
        // status never fails the caller
        if (sub === 'status') {
            return 0;
        }
        return isValidationError(error) ? 1 : 2;
    }
}

async function readEvent(args: string[], io: CliIo): Promise<HookEvent | null> {
    const [eventType, status] = args;
    if (eventType) {
        // session.status takes its status as the next argument
        return parseHookEvent(status === undefined
            ? { type: eventType }
            : { type: eventType, properties: { status } });
    }
    const input = await io.readStdin();
    try {
        return parseHookEvent(JSON.parse(input));
    } catch (error) {
        debugLog('Hook input is not JSON', error);
        return null;
    }
}

/**
 * Hand one event to a freshly built router.
 * Failures here are never surfaced: a hook must not break the assistant.
 */
async function runHook(args: string[], io: CliIo, context: CliContext, peonDir: string): Promise<void> {
    try {
        const event = await readEvent(args, io);
        if (!event) {
            return;
        }

        const router = await createRouter({
            peonDir,
            directory: context.cwd ?? process.cwd(),
            sessionId: event.sessionId,
            effects: context.effects,
            clock: context.clock
        });
        await router?.handle(event);
    } catch (error) {
        debugLog('Hook failed', error);
    }
}
