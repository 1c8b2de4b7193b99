/**
 * peon-ping System Effects
 * Binds the effect sink to the host OS: audio players, desktop notifiers,
 * frontmost-app detection, the terminal tab title and the pause marker.
 *
 * Every subprocess is detached and unref'd; nothing here waits for a sound or a
 * notification to finish, and a missing binary only drops that one effect.
 */

import { spawn, spawnSync } from 'child_process';
import type { SpawnOptions } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { EffectSink, NotifyOptions } from './types.js';
import { debugLog } from './log.js';

const PAUSED_FILE = '.paused';
const ICON_FILE = 'peon-icon.png';

/**
 * Frontmost-process names that count as "the terminal"
 */
export const TERMINAL_APPS = [
    'Terminal',
    'iTerm2',
    'Warp',
    'Alacritty',
    'kitty',
    'WezTerm',
    'ghostty',
    'Hyper',
    'Code',
    'Cursor',
    'Zed'
];

const DETACHED: SpawnOptions = { detached: true, stdio: 'ignore' };

/**
 * Escape a string for use inside an AppleScript double-quoted literal
 */
export function escapeAppleScript(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Path of the pause marker file
 */
export function getPausedFilePath(peonDir: string): string {
    return path.join(peonDir, PAUSED_FILE);
}

export function isPausedAt(peonDir: string): boolean {
    return fs.existsSync(getPausedFilePath(peonDir));
}

/**
 * Create or remove the pause marker
 */
export async function setPaused(peonDir: string, paused: boolean): Promise<void> {
    const marker = getPausedFilePath(peonDir);
    if (paused) {
        await fs.promises.mkdir(peonDir, { recursive: true });
        await fs.promises.writeFile(marker, '', 'utf-8');
    } else {
        await fs.promises.rm(marker, { force: true });
    }
}

/**
 * Launch a command without waiting for it. Calls `onError` if it cannot start.
 */
function launchDetached(command: string, args: string[], onError?: () => void): void {
    const child = spawn(command, args, DETACHED);
    child.on('error', error => {
        debugLog(`${command} unavailable`, error);
        onError?.();
    });
    child.unref();
}

function isWsl(): boolean {
    try {
        return /microsoft/i.test(fs.readFileSync('/proc/version', 'utf-8'));
    } catch {
        return false;
    }
}

/**
 * Locate terminal-notifier, which supports icons and grouping on macOS
 */
function detectTerminalNotifier(): string | null {
    const result = spawnSync('which', ['terminal-notifier'], { encoding: 'utf-8' });
    if (result.error || result.status !== 0) {
        return null;
    }
    const found = result.stdout.trim();
    return found.length > 0 ? found : null;
}

/**
 * First existing notification icon: Homebrew install, then the config directory
 */
export function resolveIconPath(peonDir: string): string | undefined {
    const candidates = [
        '/opt/homebrew/opt/peon-ping/libexec/docs/peon-icon.png',
        '/usr/local/opt/peon-ping/libexec/docs/peon-icon.png',
        path.join(peonDir, ICON_FILE)
    ];
    return candidates.find(candidate => fs.existsSync(candidate));
}

export class SystemEffects implements EffectSink {
    private readonly peonDir: string;
    private readonly platform: NodeJS.Platform;
    private terminalNotifier: string | null | undefined;

    constructor(peonDir: string, platform: NodeJS.Platform = os.platform()) {
        this.peonDir = peonDir;
        this.platform = platform;
    }

    public play(filePath: string, volume: number): void {
        if (!fs.existsSync(filePath)) {
            debugLog(`Sound file missing: ${filePath}`);
            return;
        }

        if (this.platform === 'darwin') {
            launchDetached('afplay', ['-v', String(volume), filePath]);
            return;
        }
        if (this.platform !== 'linux') {
            return;
        }

        if (isWsl()) {
            const windowsPath = filePath.replace(/\//g, '\\');
            const script = [
                'Add-Type -AssemblyName PresentationCore',
                '$p = New-Object System.Windows.Media.MediaPlayer',
                `$p.Open([Uri]::new('file:///${windowsPath}'))`,
                `$p.Volume = ${volume}`,
                'Start-Sleep -Milliseconds 200',
                '$p.Play()',
                'Start-Sleep -Seconds 3',
                '$p.Close()'
            ].join('; ');
            launchDetached('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', script]);
            return;
        }

        const paVolume = String(Math.round(volume * 65536));
        launchDetached('paplay', [`--volume=${paVolume}`, filePath], () => {
            launchDetached('aplay', ['-q', filePath]);
        });
    }

    public notify(options: NotifyOptions): void {
        if (this.platform === 'darwin') {
            this.notifyMac(options);
        } else if (this.platform === 'linux') {
            const body = options.subtitle ? `${options.subtitle}\n${options.body}` : options.body;
            const args = [options.title, body];
            if (options.iconPath) {
                args.push('-i', options.iconPath);
            }
            launchDetached('notify-send', args);
        }
    }

    private notifyMac(options: NotifyOptions): void {
        if (this.terminalNotifier === undefined) {
            this.terminalNotifier = detectTerminalNotifier();
        }

        const osascriptFallback = () => {
            let script = `display notification "${escapeAppleScript(options.body)}" with title "${escapeAppleScript(options.title)}"`;
            if (options.subtitle) {
                script += ` subtitle "${escapeAppleScript(options.subtitle)}"`;
            }
            launchDetached('osascript', ['-e', script]);
        };

        if (!this.terminalNotifier) {
            osascriptFallback();
            return;
        }

        const args = [
            '-title', options.title,
            '-message', options.body,
            '-group', options.group || 'peon-ping'
        ];
        if (options.subtitle) {
            args.push('-subtitle', options.subtitle);
        }
        if (options.iconPath) {
            args.push('-appIcon', options.iconPath);
        }
        launchDetached(this.terminalNotifier, args, osascriptFallback);
    }

    public setTitle(text: string): void {
        // Control characters would end the OSC sequence early
        const clean = text.replace(/[\x00-\x1f\x7f]/g, '');
        process.stdout.write(`\x1b]0;${clean}\x07`);
    }

    /**
     * Only macOS can answer; elsewhere the terminal is reported unfocused
     */
    public isTerminalFocused(): boolean {
        if (this.platform !== 'darwin') {
            return false;
        }

        const result = spawnSync(
            'osascript',
            ['-e', 'tell application "System Events" to get name of first process whose frontmost is true'],
            { encoding: 'utf-8' }
        );
        if (result.error || result.status !== 0) {
            return false;
        }
        const frontmost = result.stdout.trim().toLowerCase();
        return TERMINAL_APPS.some(name => name.toLowerCase() === frontmost);
    }

    public isPaused(): boolean {
        return isPausedAt(this.peonDir);
    }
}
