import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_CONFIG, type FilePulseConfig } from '../config/json-config.js';
import { ChimeGate } from '../services/chime-gate.js';
import { resolveChimeFile, type ChimePlayer } from '../services/chime-player.js';
import { ContentStore } from '../services/content-store.js';
import { EventLedger } from '../services/event-ledger.js';
import { isTrackable } from '../services/text-classifier.js';
import { buildTreeView, walkTree } from '../services/tree-view.js';
import {
    ConfigurationError,
    type DashboardState,
    type DiffLine,
    type NavigationCommand,
    type TreeView,
    type ViewportState,
} from '../types/dashboard.js';
import type { DashboardDocument, DocumentRenderer } from '../types/document.js';
import type { WatchEvent, WatchSource } from '../types/file-watcher.js';
import { getLogDir, logThought } from '../utils/logger.js';
import { composeDocument } from './document.js';
import { applyNavigation } from './navigation.js';

export interface DashboardOptions {
    watcher: WatchSource;
    player: ChimePlayer;
    renderer?: DocumentRenderer;
    config?: FilePulseConfig;
    /** Overrides `config.chime.enabled`. */
    chimeEnabled?: boolean;
    now?: () => number;
}

export interface IndexedDiff {
    index: number;
    path: string;
}

/** Resolve and check a root directory, throwing `ConfigurationError` when unusable. */
export async function validateRoot(root: string): Promise<string> {
    const resolved = path.resolve(root);
    let isDir: boolean;
    try {
        isDir = (await stat(resolved)).isDirectory();
    } catch {
        throw new ConfigurationError('root_missing', resolved);
    }
    if (!isDir) {
        throw new ConfigurationError('root_not_directory', resolved);
    }
    return resolved;
}

/**
 * Owns one monitoring session: event ledger, content history, chime gate
 * and viewport, plus the watcher subscription and the render cadence.
 *
 * Lifecycle: `idle → scanning → monitoring ⇄ suspended → stopped`.
 * All per-path state lives here and is dropped wholesale on `changeRoot`.
 */
export class Dashboard {
    readonly #watcher: WatchSource;
    readonly #player: ChimePlayer;
    readonly #config: FilePulseConfig;
    readonly #now: () => number;
    readonly #ledger = new EventLedger();
    readonly #gate: ChimeGate;
    readonly #contentChains: Map<string, Promise<void>> = new Map();

    #store = new ContentStore();
    #renderer: DocumentRenderer | null;
    #state: DashboardState = 'idle';
    #root = '';
    #rootAvailable = true;
    #chimeEnabled: boolean;
    #viewport: ViewportState;
    #lastView: TreeView | undefined;
    #digitBuffer = '';
    #generation = 0;
    #rendering = false;
    #tickTimer: NodeJS.Timeout | null = null;
    #rootCheckTimer: NodeJS.Timeout | null = null;

    constructor(options: DashboardOptions) {
        this.#watcher = options.watcher;
        this.#player = options.player;
        this.#renderer = options.renderer ?? null;
        this.#config = options.config ?? DEFAULT_CONFIG;
        this.#now = options.now ?? (() => Date.now());
        this.#chimeEnabled = options.chimeEnabled ?? this.#config.chime.enabled;
        this.#gate = new ChimeGate({ ...this.#config.chime, now: this.#now });
        this.#viewport = { scrollOffset: 0, visibleRowCount: this.#config.display.defaultVisibleRows };
    }

    get state(): DashboardState {
        return this.#state;
    }

    get root(): string {
        return this.#root;
    }

    get rootAvailable(): boolean {
        return this.#rootAvailable;
    }

    get chimeEnabled(): boolean {
        return this.#chimeEnabled;
    }

    get viewport(): ViewportState {
        return { ...this.#viewport };
    }

    get ledger(): EventLedger {
        return this.#ledger;
    }

    get store(): ContentStore {
        return this.#store;
    }

    /** Swap the renderer, e.g. after the terminal was handed to a prompt. */
    attachRenderer(renderer: DocumentRenderer | null): void {
        this.#renderer = renderer;
    }

    async start(root: string): Promise<void> {
        if (this.#state !== 'idle') {
            throw new Error(`[Dashboard] Cannot start from state '${this.#state}'.`);
        }

        this.#root = await validateRoot(root);
        this.#rootAvailable = true;
        await this.#scanAndSubscribe();
        this.#state = 'monitoring';
        this.#startTimers();

        await logThought(`[Dashboard] Monitoring ${this.#root}`);
    }

    /**
     * Apply one watcher event. The returned promise settles once this
     * event's content update (if any) has been applied; callers may ignore it.
     */
    handleEvent(event: WatchEvent): Promise<void> {
        if (this.#state === 'idle' || this.#state === 'stopped') {
            return Promise.resolve();
        }

        const filePath = path.resolve(event.path);
        this.#ledger.record(filePath, event.kind, this.#now(), event.isDirectory);

        if (this.#gate.onEvent() && this.#chimeEnabled) {
            this.#playChime();
        }

        if (event.kind === 'deleted' || event.isDirectory) {
            return Promise.resolve();
        }
        return this.#enqueueContentUpdate(filePath, event.kind);
    }

    /** Rebuild the tree for the current viewport and remember it for navigation. */
    async refreshView(): Promise<TreeView> {
        this.#rootAvailable = await isDirectory(this.#root);
        const view = await buildTreeView({
            root: this.#root,
            ledger: this.#ledger,
            store: this.#store,
            viewport: this.#viewport,
            now: this.#now(),
            maxDepth: this.#config.display.maxDepth,
        });
        this.#lastView = view;
        this.#viewport = { ...this.#viewport, scrollOffset: view.scrollOffset };
        return view;
    }

    /**
     * Produce one frame and hand it to the renderer.
     * Returns undefined when a previous frame is still being built.
     */
    async renderFrame(): Promise<DashboardDocument | undefined> {
        if (this.#rendering) return undefined;
        this.#rendering = true;

        try {
            if (this.#renderer) {
                const selected = this.#viewport.selectedDiffPath;
                const withDiff = selected !== undefined && this.#store.hasPendingDiff(selected);
                this.#viewport = {
                    ...this.#viewport,
                    visibleRowCount: Math.max(1, Math.floor(this.#renderer.visibleRows(withDiff))),
                };
            }

            const view = await this.refreshView();
            const selectedPath = this.#viewport.selectedDiffPath;
            const selectedLines = selectedPath ? this.#store.diff(selectedPath) : undefined;

            const document = composeDocument({
                root: this.#root,
                rootAvailable: this.#rootAvailable,
                view,
                summary: this.#ledger.summarize(this.#now()),
                chimeEnabled: this.#chimeEnabled,
                now: this.#now(),
                viewportHeight: this.#viewport.visibleRowCount,
                selectedDiff: selectedPath && selectedLines ? { path: selectedPath, lines: selectedLines } : undefined,
                mostRecent: this.#ledger.mostRecent(),
                pendingDigits: this.#digitBuffer,
            });

            if (this.#renderer) {
                try {
                    this.#renderer.render(document);
                } catch (err) {
                    await logThought(`[Dashboard] Render failed: ${describe(err)}`);
                }
            }
            return document;
        } finally {
            this.#rendering = false;
        }
    }

    navigate(command: NavigationCommand): void {
        const view = this.#lastView;
        const recent = this.#ledger.mostRecent();
        this.#viewport = applyNavigation(this.#viewport, command, {
            totalRows: view?.totalRows ?? 0,
            scrollStep: this.#config.display.scrollStep,
            diffIndex: view?.diffIndex ?? new Map(),
            mostRecentRow: recent && view ? view.rowPosition(recent.path) : undefined,
        });
    }

    /** Digits typed so far towards a diff number, shown in the instructions. */
    setDigitBuffer(digits: string): void {
        this.#digitBuffer = digits;
    }

    /** Pause the render cadence for an interactive prompt. The watcher keeps running. */
    suspend(): void {
        if (this.#state !== 'monitoring') return;
        this.#stopTimers();
        this.#state = 'suspended';
    }

    resume(): void {
        if (this.#state !== 'suspended') return;
        this.#state = 'monitoring';
        this.#startTimers();
    }

    /**
     * Switch to another root. Validation happens first, so a bad path leaves
     * the current session untouched.
     */
    async changeRoot(newRoot: string): Promise<void> {
        if (this.#state === 'stopped' || this.#state === 'idle') {
            throw new Error(`[Dashboard] Cannot change root from state '${this.#state}'.`);
        }

        const resolved = await validateRoot(newRoot);
        const resumeAs = this.#state === 'suspended' ? 'suspended' : 'monitoring';

        this.#stopTimers();
        await this.#teardownWatcher();

        this.#generation += 1;
        this.#contentChains.clear();
        this.#ledger.clear();
        // in-flight reads still hold the old store
        this.#store = new ContentStore();
        this.#gate.reset();
        this.#viewport = { scrollOffset: 0, visibleRowCount: this.#viewport.visibleRowCount };
        this.#lastView = undefined;
        this.#digitBuffer = '';
        this.#root = resolved;
        this.#rootAvailable = true;

        await this.#scanAndSubscribe();
        this.#state = resumeAs;
        if (resumeAs === 'monitoring') {
            this.#startTimers();
        }

        await logThought(`[Dashboard] Switched root to ${resolved}`);
    }

    toggleChime(): boolean {
        this.#chimeEnabled = !this.#chimeEnabled;
        return this.#chimeEnabled;
    }

    /** Sound file that would play right now, if any. */
    chimeFile(): string | undefined {
        return resolveChimeFile(this.#config.chime.soundFile, this.#root);
    }

    /** Files with a pending diff, numbered as on screen. */
    async listDiffs(): Promise<IndexedDiff[]> {
        const view = await this.refreshView();
        return [...view.diffIndex].map(([index, filePath]) => ({ index, path: filePath }));
    }

    diffFor(filePath: string): DiffLine[] | undefined {
        return this.#store.diff(filePath);
    }

    /** Diff for the file numbered `index` in the latest view. */
    diffByIndex(index: number): { path: string; lines: DiffLine[] } | undefined {
        const filePath = this.#lastView?.diffIndex.get(index);
        if (!filePath) return undefined;
        const lines = this.#store.diff(filePath);
        return lines ? { path: filePath, lines } : undefined;
    }

    /** Re-check that the root still exists; flips the degraded display on or off. */
    async checkRoot(): Promise<boolean> {
        const available = await isDirectory(this.#root);
        if (available !== this.#rootAvailable) {
            await logThought(available
                ? `[Dashboard] Root is back: ${this.#root}`
                : `[Dashboard] Root vanished: ${this.#root}`);
        }
        this.#rootAvailable = available;
        return available;
    }

    /** Terminal. In-memory state is kept; chimes already playing are left alone. */
    async stop(): Promise<void> {
        if (this.#state === 'stopped') return;
        this.#stopTimers();
        this.#state = 'stopped';
        await this.#teardownWatcher();
        await logThought(`[Dashboard] Stopped monitoring ${this.#root}`);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #scanAndSubscribe(): Promise<void> {
        this.#state = 'scanning';
        await this.#scanContents();
        await this.#watcher.subscribe(this.#root, (event) => this.handleEvent(event), {
            exclude: [...this.#config.watch.exclude, getLogDir()],
            stabilityThresholdMs: this.#config.watch.stabilityThresholdMs,
        });
    }

    async #scanContents(): Promise<void> {
        // a fresh ledger: no tombstones during the scan
        const walk = walkTree(this.#root, new EventLedger(), this.#now(), this.#config.display.maxDepth);
        for await (const item of walk) {
            if (item.type !== 'entry' || item.isDirectory) continue;
            if (!(await isTrackable(item.path))) continue;
            try {
                this.#store.onSeen(item.path, await readFile(item.path, 'utf8'));
            } catch (err) {
                // a later event will pick it up
                await logThought(`[Dashboard] Skipped unreadable file ${item.path}: ${describe(err)}`);
            }
        }
    }

    #enqueueContentUpdate(filePath: string, kind: 'created' | 'modified'): Promise<void> {
        const generation = this.#generation;
        const store = this.#store;
        const previous = this.#contentChains.get(filePath) ?? Promise.resolve();

        const next = previous
            .then(async () => {
                if (generation !== this.#generation) return;
                await store.onModifiedOrCreated(filePath, kind);
            })
            .catch(async (err: unknown) => {
                await logThought(`[Dashboard] Content update failed for ${filePath}: ${describe(err)}`);
            });

        this.#contentChains.set(filePath, next);
        return next.then(() => {
            if (this.#contentChains.get(filePath) === next) {
                this.#contentChains.delete(filePath);
            }
        });
    }

    #playChime(): void {
        const soundFile = this.chimeFile();
        if (!soundFile) return;
        try {
            this.#player.play(soundFile);
        } catch (err) {
            void logThought(`[Chime] Playback failed: ${describe(err)}`);
        }
    }

    #startTimers(): void {
        if (this.#tickTimer) return;
        this.#tickTimer = setInterval(() => {
            this.renderFrame().catch((err: unknown) => logThought(`[Dashboard] Frame failed: ${describe(err)}`));
        }, this.#config.display.tickMs);
        this.#rootCheckTimer = setInterval(() => {
            this.checkRoot().catch((err: unknown) => logThought(`[Dashboard] Root check failed: ${describe(err)}`));
        }, this.#config.display.rootCheckMs);
    }

    #stopTimers(): void {
        if (this.#tickTimer) clearInterval(this.#tickTimer);
        if (this.#rootCheckTimer) clearInterval(this.#rootCheckTimer);
        this.#tickTimer = null;
        this.#rootCheckTimer = null;
    }

    async #teardownWatcher(): Promise<void> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), this.#config.watch.stopTimeoutMs);
        });

        try {
            const outcome = await Promise.race([
                this.#watcher.unsubscribe().then(() => 'closed' as const),
                timeout,
            ]);
            if (outcome === 'timeout') {
                await logThought(`[Dashboard] Watcher did not close within ${this.#config.watch.stopTimeoutMs}ms.`);
            }
        } catch (err) {
            await logThought(`[Dashboard] Watcher close failed: ${describe(err)}`);
        } finally {
            clearTimeout(timer);
        }
    }
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isDirectory();
    } catch {
        return false;
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
