/**
 * Diagnostic logging
 * Hooks run inside the assistant's process tree, so the hook path only logs
 * when PEON_PING_DEBUG is set. Everything goes to stderr.
 */

const PREFIX = '[peon-ping]';

export function isDebugEnabled(): boolean {
    const flag = process.env.PEON_PING_DEBUG;
    return flag === '1' || flag === 'true';
}

/**
 * Log a diagnostic line when debugging is enabled
 */
export function debugLog(message: string, error?: unknown): void {
    if (!isDebugEnabled()) return;
    if (error === undefined) {
        console.error(`${PREFIX} ${message}`);
    } else {
        console.error(`${PREFIX} ${message}:`, error);
    }
}

