#!/usr/bin/env node
/**
 * peon-ping entry point
 * Sound packs, desktop notifications and fitness nudges for coding assistant events
 */

import { runCli } from './cli.js';
import type { CliIo } from './cli.js';

async function readStdin(): Promise<string> {
    if (process.stdin.isTTY) {
        return '';
    }
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
}

const io: CliIo = {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    readStdin
};

runCli(process.argv.slice(2), io)
    .then(code => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
