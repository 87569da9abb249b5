import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { logThought } from '../utils/logger.js';
import type {
    ChangeKind,
    WatchEvent,
    WatchEventListener,
    WatchOptions,
    WatchSource,
} from '../types/file-watcher.js';

type ChokidarEvent = 'add' | 'change' | 'unlink' | 'addDir' | 'unlinkDir';

const EVENT_MAP: Record<ChokidarEvent, { kind: ChangeKind; isDirectory: boolean }> = {
    add: { kind: 'created', isDirectory: false },
    change: { kind: 'modified', isDirectory: false },
    unlink: { kind: 'deleted', isDirectory: false },
    addDir: { kind: 'created', isDirectory: true },
    unlinkDir: { kind: 'deleted', isDirectory: true },
};

const EVENT_TYPES: ChokidarEvent[] = ['add', 'change', 'unlink', 'addDir', 'unlinkDir'];

/**
 * Recursively watches one directory and reports created / modified /
 * deleted events to a single listener.
 *
 * Uses `chokidar` for cross-platform watching with write-stability
 * debouncing and glob-based exclusion.
 *
 * Usage:
 * ```ts
 * const watcher = new FileWatcherService();
 * await watcher.subscribe('/path/to/project', (event) => console.log(event), {
 *   exclude: ['**\/node_modules/**'],
 * });
 * // ...
 * await watcher.unsubscribe();
 * ```
 */
export class FileWatcherService implements WatchSource {
    #watcher: FSWatcher | null = null;
    #root: string | null = null;
    #listener: WatchEventListener | null = null;

    get active(): boolean {
        return this.#watcher !== null;
    }

    async subscribe(root: string, listener: WatchEventListener, options: WatchOptions = {}): Promise<void> {
        if (this.#watcher) {
            await this.unsubscribe();
        }

        const directory = path.resolve(root);
        const stability = options.stabilityThresholdMs ?? 0;

        const watcher = watch(directory, {
            ignored: options.exclude ?? [],
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: stability > 0
                ? { stabilityThreshold: stability, pollInterval: Math.min(100, stability) }
                : false,
        });

        for (const eventType of EVENT_TYPES) {
            watcher.on(eventType, (filePath: string) => {
                void this.#handleEvent(eventType, filePath);
            });
        }

        watcher.on('error', (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[FileWatcher] Error while watching ${directory}: ${message}`);
        });

        this.#watcher = watcher;
        this.#root = directory;
        this.#listener = listener;

        await logThought(`[FileWatcher] Started watching ${directory}`);
    }

    /** Stop watching. Safe to call when nothing is subscribed. */
    async unsubscribe(): Promise<void> {
        const watcher = this.#watcher;
        if (!watcher) return;

        const root = this.#root;
        this.#watcher = null;
        this.#root = null;
        this.#listener = null;

        await watcher.close();
        await logThought(`[FileWatcher] Stopped watching ${root ?? 'unknown root'}.`);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #handleEvent(type: ChokidarEvent, filePath: string): Promise<void> {
        const listener = this.#listener;
        if (!listener) return;

        const mapped = EVENT_MAP[type];
        const event: WatchEvent = {
            kind: mapped.kind,
            path: path.resolve(filePath),
            isDirectory: mapped.isDirectory,
        };

        try {
            await listener(event);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logThought(`[FileWatcher] Listener threw on ${event.kind} ${event.path}: ${message}`);
        }
    }
}
