import { appendFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

let configuredDir: string | undefined;
let failureReported = false;

/** Point the daily log at a directory from config. Blank resets to the default. */
export function setLogDir(dir: string | undefined): void {
    configuredDir = dir && dir.trim() ? path.resolve(dir) : undefined;
}

export function getLogDir(): string {
    const fromEnv = process.env.FILEPULSE_LOG_DIR;
    if (fromEnv && fromEnv.trim() !== '') {
        return path.resolve(fromEnv);
    }
    return configuredDir ?? path.join(os.homedir(), '.filepulse', 'logs');
}

export function getLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Append an entry to today's Markdown log.
 * Never rejects: the dashboard owns the terminal, so a failing disk is
 * reported once and otherwise ignored.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const entry = `## Thought @ ${now.toISOString()}\n${message}\n\n`;

    try {
        await mkdir(getLogDir(), { recursive: true });
        await appendFile(getLogPath(now), entry, 'utf8');
    } catch (error) {
        if (failureReported) return;
        failureReported = true;
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write log entry: ${reason}`);
    }
}
