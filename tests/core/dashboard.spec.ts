import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, rm, unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, type FilePulseConfig } from '../../src/config/json-config.js';
import { Dashboard } from '../../src/core/dashboard.js';
import { ConfigurationError } from '../../src/types/dashboard.js';
import type { DashboardDocument, DocumentBlock, DocumentRenderer, StyledLine } from '../../src/types/document.js';
import type { WatchEvent, WatchEventListener, WatchOptions, WatchSource } from '../../src/types/file-watcher.js';

class FakeWatcher implements WatchSource {
    root: string | undefined;
    options: WatchOptions | undefined;
    listener: WatchEventListener | null = null;
    unsubscribeCalls = 0;

    get active(): boolean {
        return this.listener !== null;
    }

    async subscribe(root: string, listener: WatchEventListener, options?: WatchOptions): Promise<void> {
        this.root = root;
        this.listener = listener;
        this.options = options;
    }

    async unsubscribe(): Promise<void> {
        this.unsubscribeCalls += 1;
        this.listener = null;
    }

    async emit(event: WatchEvent): Promise<void> {
        await this.listener?.(event);
    }
}

class FakeRenderer implements DocumentRenderer {
    documents: DashboardDocument[] = [];
    render = vi.fn((doc: DashboardDocument) => {
        this.documents.push(doc);
    });
    visibleRows(withDiff: boolean): number {
        return withDiff ? 8 : 25;
    }
}

const text = (line: StyledLine) => line.map((span) => span.text).join('');
const lines = (doc: DashboardDocument | undefined, id: DocumentBlock['id']) =>
    doc?.blocks.find((b) => b.id === id)?.lines.map(text) ?? [];

describe('Dashboard', () => {
    let tmp: string;
    let root: string;
    let logDir: string;
    let clock: number;
    let watcher: FakeWatcher;
    let renderer: FakeRenderer;
    let player: { play: ReturnType<typeof vi.fn> };
    let config: FilePulseConfig;
    let dashboard: Dashboard;

    const make = (overrides: Partial<ConstructorParameters<typeof Dashboard>[0]> = {}) =>
        new Dashboard({ watcher, player, renderer, config, now: () => clock, ...overrides });

    beforeEach(async () => {
        tmp = await mkdtemp(path.join(os.tmpdir(), 'filepulse-dashboard-'));
        root = path.join(tmp, 'proj');
        logDir = path.join(tmp, 'logs');
        await mkdir(root);
        await writeFile(path.join(root, 'a.txt'), 'a\n');
        await writeFile(path.join(tmp, 'bell.mp3'), '');
        vi.stubEnv('FILEPULSE_LOG_DIR', logDir);

        clock = 0;
        watcher = new FakeWatcher();
        renderer = new FakeRenderer();
        player = { play: vi.fn() };
        config = {
            ...DEFAULT_CONFIG,
            chime: { ...DEFAULT_CONFIG.chime, soundFile: path.join(tmp, 'bell.mp3') },
            display: { ...DEFAULT_CONFIG.display, tickMs: 3_600_000, rootCheckMs: 3_600_000 },
            watch: { ...DEFAULT_CONFIG.watch, stabilityThresholdMs: 0, stopTimeoutMs: 50 },
        };
        dashboard = make();
    });

    afterEach(async () => {
        await dashboard.stop();
        vi.useRealTimers();
        vi.unstubAllEnvs();
        await rm(tmp, { recursive: true, force: true });
    });

    describe('start', () => {
        it('scans existing files and subscribes with the log directory excluded', async () => {
            await dashboard.start(root);

            expect(dashboard.state).toBe('monitoring');
            expect(dashboard.root).toBe(root);
            expect(dashboard.store.has(path.join(root, 'a.txt'))).toBe(true);
            expect(watcher.root).toBe(root);
            expect(watcher.options).toEqual({
                exclude: ['**/node_modules/**', '**/.git/**', logDir],
                stabilityThresholdMs: 0,
            });
        });

        it('rejects a missing root and stays idle', async () => {
            const missing = path.join(tmp, 'missing');
            await expect(dashboard.start(missing)).rejects.toMatchObject({ code: 'root_missing', path: missing });
            expect(dashboard.state).toBe('idle');
            expect(watcher.active).toBe(false);
        });

        it('rejects a root that is a file', async () => {
            await expect(dashboard.start(path.join(root, 'a.txt'))).rejects.toBeInstanceOf(ConfigurationError);
        });

        it('cannot be started twice', async () => {
            await dashboard.start(root);
            await expect(dashboard.start(root)).rejects.toThrow("Cannot start from state 'monitoring'");
        });
    });

    it('shows only the added line for a file created then appended to', async () => {
        await dashboard.start(root);
        const created = path.join(root, 'new.txt');

        clock = 1_000;
        await writeFile(created, 'x\n');
        await watcher.emit({ kind: 'created', path: created, isDirectory: false });

        clock = 2_000;
        await writeFile(created, 'x\ny\n');
        await watcher.emit({ kind: 'modified', path: created, isDirectory: false });

        const diff = dashboard.diffFor(created) ?? [];
        expect(diff.filter((line) => line.kind === 'insert' || line.kind === 'delete')).toEqual([
            { kind: 'insert', text: 'y' },
        ]);
        expect(await dashboard.listDiffs()).toEqual([{ index: 1, path: created }]);
        expect(dashboard.diffByIndex(1)?.path).toBe(created);

        const doc = await dashboard.renderFrame();
        expect(lines(doc, 'tree')).toContain('[1] 📄 new.txt [NEW] (4B)');
        expect(lines(doc, 'status')[1]).toBe('Created: 0 | Modified: 1 | Deleted: 0 | Chime: ON');
        expect(renderer.render).toHaveBeenCalledTimes(1);
    });

    it('applies a burst of events for one path in delivery order', async () => {
        await dashboard.start(root);
        const file = path.join(root, 'a.txt');

        await writeFile(file, 'b\n');
        const first = dashboard.handleEvent({ kind: 'modified', path: file, isDirectory: false });
        const second = dashboard.handleEvent({ kind: 'modified', path: file, isDirectory: false });
        await Promise.all([first, second]);

        expect(dashboard.diffFor(file)?.slice(2)).toEqual([
            { kind: 'hunk', text: '@@ -1,1 +1,1 @@' },
            { kind: 'delete', text: 'a' },
            { kind: 'insert', text: 'b' },
        ]);
    });

    it('renders a tombstone for thirty seconds after a deletion', async () => {
        await dashboard.start(root);
        const file = path.join(root, 'a.txt');

        clock = 1_000;
        await unlink(file);
        await watcher.emit({ kind: 'deleted', path: file, isDirectory: false });

        clock = 2_000;
        expect(lines(await dashboard.renderFrame(), 'tree')).toContain('🗑️ a.txt');

        clock = 31_000;
        expect(lines(await dashboard.renderFrame(), 'tree')).toEqual([`📁 ${path.basename(root)} (empty)`]);
    });

    describe('chime', () => {
        it('plays for an isolated event after a quiet spell', async () => {
            await dashboard.start(root);
            clock = 4_000;
            await dashboard.handleEvent({ kind: 'created', path: path.join(root, 'dir'), isDirectory: true });

            expect(player.play).toHaveBeenCalledWith(path.join(tmp, 'bell.mp3'));
        });

        it('stays quiet while disabled', async () => {
            dashboard = make({ chimeEnabled: false });
            await dashboard.start(root);
            clock = 4_000;
            await dashboard.handleEvent({ kind: 'created', path: path.join(root, 'dir'), isDirectory: true });

            expect(player.play).not.toHaveBeenCalled();
            expect(dashboard.toggleChime()).toBe(true);
        });

        it('keeps going when the player throws', async () => {
            player.play.mockImplementation(() => {
                throw new Error('no audio device');
            });
            await dashboard.start(root);
            clock = 4_000;

            await expect(dashboard.handleEvent({ kind: 'created', path: path.join(root, 'x'), isDirectory: true }))
                .resolves.toBeUndefined();
        });
    });

    it('sizes the viewport from the renderer and survives renderer failures', async () => {
        await dashboard.start(root);
        renderer.render.mockImplementation(() => {
            throw new Error('terminal gone');
        });

        const doc = await dashboard.renderFrame();

        expect(doc?.viewportHeight).toBe(25);
        expect(dashboard.viewport.visibleRowCount).toBe(25);
    });

    it('opens and closes a diff through navigation', async () => {
        await dashboard.start(root);
        const file = path.join(root, 'a.txt');
        await writeFile(file, 'b\n');
        await dashboard.handleEvent({ kind: 'modified', path: file, isDirectory: false });
        await dashboard.renderFrame();

        dashboard.navigate({ type: 'select-diff', index: 1 });
        const open = await dashboard.renderFrame();
        expect(open?.blocks.map((b) => b.id)).toEqual(['status', 'tree', 'diff', 'instructions']);
        expect(open?.viewportHeight).toBe(8);

        dashboard.navigate({ type: 'close-diff' });
        const closed = await dashboard.renderFrame();
        expect(closed?.blocks.map((b) => b.id)).toEqual(['status', 'tree', 'instructions']);
        expect(closed?.viewportHeight).toBe(25);
    });

    describe('changeRoot', () => {
        it('leaves the session untouched when the new path is bad', async () => {
            await dashboard.start(root);
            clock = 500;
            await dashboard.handleEvent({ kind: 'modified', path: path.join(root, 'a.txt'), isDirectory: false });

            await expect(dashboard.changeRoot(path.join(tmp, 'nope'))).rejects.toBeInstanceOf(ConfigurationError);

            expect(dashboard.root).toBe(root);
            expect(watcher.active).toBe(true);
            expect(dashboard.ledger.latest(path.join(root, 'a.txt'))?.kind).toBe('modified');
        });

        it('drops all per-path state and rescans the new root', async () => {
            const other = path.join(tmp, 'other');
            await mkdir(other);
            await writeFile(path.join(other, 'b.txt'), 'b\n');
            await dashboard.start(root);
            await dashboard.handleEvent({ kind: 'modified', path: path.join(root, 'a.txt'), isDirectory: false });

            await dashboard.changeRoot(other);

            expect(dashboard.root).toBe(other);
            expect(dashboard.state).toBe('monitoring');
            expect(watcher.root).toBe(other);
            expect(dashboard.ledger.latest(path.join(root, 'a.txt'))).toBeUndefined();
            expect(dashboard.store.has(path.join(root, 'a.txt'))).toBe(false);
            expect(dashboard.store.has(path.join(other, 'b.txt'))).toBe(true);
            expect(dashboard.viewport.scrollOffset).toBe(0);
        });

        it('discards content reads still in flight for the old root', async () => {
            const other = path.join(tmp, 'other');
            await mkdir(other);
            await dashboard.start(root);
            const file = path.join(root, 'a.txt');
            await writeFile(file, 'changed\n');

            const pending = dashboard.handleEvent({ kind: 'modified', path: file, isDirectory: false });
            await dashboard.changeRoot(other);
            await pending;

            expect(dashboard.store.has(file)).toBe(false);
        });

        it('keeps a suspended session suspended', async () => {
            const other = path.join(tmp, 'other');
            await mkdir(other);
            await dashboard.start(root);
            dashboard.suspend();

            await dashboard.changeRoot(other);

            expect(dashboard.state).toBe('suspended');
        });
    });

    it('degrades the display when the root vanishes', async () => {
        await dashboard.start(root);
        await rm(root, { recursive: true, force: true });

        expect(await dashboard.checkRoot()).toBe(false);
        const doc = await dashboard.renderFrame();

        expect(doc?.blocks.find((b) => b.id === 'status')?.tone).toBe('alert');
        expect(lines(doc, 'tree')[0]).toBe(`❌ Directory not found: ${root}`);
        expect(watcher.active).toBe(true);
    });

    it('pauses the render tick while suspended', async () => {
        vi.useFakeTimers();
        config = { ...config, display: { ...config.display, tickMs: 500 } };
        dashboard = make();
        await dashboard.start(root);

        dashboard.suspend();
        expect(dashboard.state).toBe('suspended');
        await vi.advanceTimersByTimeAsync(5_000);
        expect(renderer.render).not.toHaveBeenCalled();

        dashboard.resume();
        expect(dashboard.state).toBe('monitoring');
        await vi.advanceTimersByTimeAsync(500);
        await vi.waitFor(() => expect(renderer.render).toHaveBeenCalled());
    });

    describe('stop', () => {
        it('unsubscribes once and ignores later events', async () => {
            await dashboard.start(root);
            await dashboard.stop();
            await dashboard.stop();

            expect(dashboard.state).toBe('stopped');
            expect(watcher.unsubscribeCalls).toBe(1);

            await dashboard.handleEvent({ kind: 'created', path: path.join(root, 'late.txt'), isDirectory: false });
            expect(dashboard.ledger.latest(path.join(root, 'late.txt'))).toBeUndefined();
        });

        it('gives up waiting on a watcher that will not close', async () => {
            const stuck = new FakeWatcher();
            stuck.unsubscribe = () => new Promise<void>(() => undefined);
            dashboard = make({ watcher: stuck });
            await dashboard.start(root);

            await expect(dashboard.stop()).resolves.toBeUndefined();
            expect(dashboard.state).toBe('stopped');
        });
    });
});
