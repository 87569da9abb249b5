import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getLogPath } from '../utils/logger.js';

const TAIL_CONTEXT_BYTES = 4096;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface LogWatchHandle {
    close(): void;
}

/** Calls `onChange` whenever the log file's content changes. */
export type WatchLogFn = (filePath: string, onChange: () => void) => LogWatchHandle;

export interface LogsCliOptions {
    now?: Date;
    watchLog?: WatchLogFn;
    write?: (chunk: string) => void;
}

const watchWithFs: WatchLogFn = (filePath, onChange) =>
    fs.watch(filePath, (eventType) => {
        if (eventType === 'change') onChange();
    });

/**
 * Handle `logs [--date YYYY-MM-DD] [--follow]`.
 * Prints one day's filepulse log, or tails it as the dashboard writes.
 */
export async function handleLogsCli(argv: string[], options: LogsCliOptions = {}): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const write = options.write ?? ((chunk: string) => {
        process.stdout.write(chunk);
    });
    const follow = argv.includes('--follow') || argv.includes('-f');

    const date = resolveLogDate(argv, options.now ?? new Date());
    if (!date) {
        console.error('[Logs] --date expects a day as YYYY-MM-DD.');
        process.exitCode = 1;
        return true;
    }

    const day = date.toISOString().slice(0, 10);
    const logPath = getLogPath(date);

    if (!fs.existsSync(logPath)) {
        console.error(`[Logs] No filepulse log for ${day} at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (!follow) {
        write(await fsPromises.readFile(logPath, 'utf8'));
        process.exitCode = 0;
        return true;
    }

    console.log(`[Logs] Following ${logPath} (Ctrl+C to stop)...\n`);
    await followLog(logPath, options.watchLog ?? watchWithFs, write);
    return true;
}

function resolveLogDate(argv: string[], now: Date): Date | undefined {
    const flagIndex = argv.indexOf('--date');
    if (flagIndex === -1) return now;

    const value = argv[flagIndex + 1];
    if (value === undefined || !DATE_PATTERN.test(value)) return undefined;

    const date = new Date(`${value}T00:00:00.000Z`);
    return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Print the last few KB of the log, then every byte appended after it.
 * A log that shrinks is followed from its new end.
 */
async function followLog(logPath: string, watchLog: WatchLogFn, write: (chunk: string) => void): Promise<void> {
    const { size } = await fsPromises.stat(logPath);
    let position = Math.max(0, size - TAIL_CONTEXT_BYTES);

    const readNewBytes = async (): Promise<void> => {
        const { size: current } = await fsPromises.stat(logPath);
        if (current <= position) {
            position = current;
            return;
        }

        const handle = await fsPromises.open(logPath, 'r');
        try {
            const buffer = Buffer.alloc(current - position);
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
            position += bytesRead;
            write(buffer.subarray(0, bytesRead).toString('utf8'));
        } finally {
            await handle.close();
        }
    };

    // reads run one at a time so `position` only moves forward in order
    let pending = readNewBytes();
    await pending;

    try {
        watchLog(logPath, () => {
            pending = pending.then(readNewBytes).catch((err: unknown) => {
                console.error(`[Logs] Failed to read ${logPath}: ${describe(err)}`);
            });
        });
    } catch (err) {
        console.error(`[Logs] Failed to watch ${logPath}: ${describe(err)}`);
        process.exitCode = 1;
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
