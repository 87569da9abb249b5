import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface ChimeConfig {
    enabled: boolean;
    /** Explicit sound file; blank means search the default locations. */
    soundFile: string;
    batchSize: number;
    cooldownMs: number;
    isolatedWindowMs: number;
}

export interface DisplayConfig {
    tickMs: number;
    rootCheckMs: number;
    maxDepth: number;
    scrollStep: number;
    defaultVisibleRows: number;
}

export interface WatchConfig {
    exclude: string[];
    stabilityThresholdMs: number;
    stopTimeoutMs: number;
}

export interface FilePulseConfig {
    chime: ChimeConfig;
    display: DisplayConfig;
    watch: WatchConfig;
    logging: {
        dir: string;
    };
}

export const DEFAULT_CONFIG: FilePulseConfig = {
    chime: {
        enabled: true,
        soundFile: '',
        batchSize: 10,
        cooldownMs: 1000,
        isolatedWindowMs: 3000,
    },
    display: {
        tickMs: 500,
        rootCheckMs: 5000,
        maxDepth: 10,
        scrollStep: 5,
        defaultVisibleRows: 30,
    },
    watch: {
        exclude: ['**/node_modules/**', '**/.git/**'],
        stabilityThresholdMs: 300,
        stopTimeoutMs: 2000,
    },
    logging: {
        dir: '',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.FILEPULSE_CONFIG_PATH) {
        return path.resolve(process.env.FILEPULSE_CONFIG_PATH);
    }
    return path.join(os.homedir(), '.filepulse', 'config.json');
}

export async function readConfig(overridePath?: string): Promise<FilePulseConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoCode(error, 'ENOENT')) return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to read config file at ${targetPath}: ${message}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

/**
 * Overlay a parsed JSON document on the defaults, section by section.
 * Fields of the wrong type keep their default.
 */
export function mergeWithDefaults(loaded: unknown): FilePulseConfig {
    const root = asRecord(loaded);
    const chime = asRecord(root.chime);
    const display = asRecord(root.display);
    const watch = asRecord(root.watch);
    const logging = asRecord(root.logging);
    const defaults = DEFAULT_CONFIG;

    return {
        chime: {
            enabled: pickBoolean(chime.enabled, defaults.chime.enabled),
            soundFile: pickString(chime.soundFile, defaults.chime.soundFile),
            batchSize: pickPositive(chime.batchSize, defaults.chime.batchSize),
            cooldownMs: pickNonNegative(chime.cooldownMs, defaults.chime.cooldownMs),
            isolatedWindowMs: pickNonNegative(chime.isolatedWindowMs, defaults.chime.isolatedWindowMs),
        },
        display: {
            tickMs: pickPositive(display.tickMs, defaults.display.tickMs),
            rootCheckMs: pickPositive(display.rootCheckMs, defaults.display.rootCheckMs),
            maxDepth: pickPositive(display.maxDepth, defaults.display.maxDepth),
            scrollStep: pickPositive(display.scrollStep, defaults.display.scrollStep),
            defaultVisibleRows: pickPositive(display.defaultVisibleRows, defaults.display.defaultVisibleRows),
        },
        watch: {
            exclude: Array.isArray(watch.exclude)
                ? watch.exclude.filter((value): value is string => typeof value === 'string')
                : [...defaults.watch.exclude],
            stabilityThresholdMs: pickNonNegative(watch.stabilityThresholdMs, defaults.watch.stabilityThresholdMs),
            stopTimeoutMs: pickPositive(watch.stopTimeoutMs, defaults.watch.stopTimeoutMs),
        },
        logging: {
            dir: pickString(logging.dir, defaults.logging.dir),
        },
    };
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : {};
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

function pickString(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function pickNonNegative(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function pickPositive(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

function isErrnoCode(error: unknown, code: string): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
