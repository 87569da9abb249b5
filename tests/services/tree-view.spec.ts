import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ContentStore } from '../../src/services/content-store.js';
import { EventLedger } from '../../src/services/event-ledger.js';
import { DELETED_STYLE } from '../../src/services/recency-classifier.js';
import { buildTreeView, clampScrollOffset, formatSize, walkTree } from '../../src/services/tree-view.js';
import type { EntryRow, ErrorRow, TreeRow } from '../../src/types/dashboard.js';
import type { WalkEntry } from '../../src/services/tree-view.js';

const viewport = (scrollOffset = 0, visibleRowCount = 30) => ({ scrollOffset, visibleRowCount });

function entries(rows: TreeRow[]): EntryRow[] {
    return rows.filter((row): row is EntryRow => row.type === 'entry');
}

describe('buildTreeView', () => {
    let dir: string;
    let ledger: EventLedger;
    let store: ContentStore;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'filepulse-tree-'));
        ledger = new EventLedger();
        store = new ContentStore();

        await writeFile(path.join(dir, 'b.txt'), 'hello');
        await writeFile(path.join(dir, 'A.md'), 'a\n');
        await writeFile(path.join(dir, '.hidden'), 'secret');
        await mkdir(path.join(dir, 'sub'));
        await writeFile(path.join(dir, 'sub', 'inner.txt'), 'inner\n');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('lists files before directories, case-insensitively, skipping dot entries', async () => {
        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 0 });

        expect(entries(view.rows).map((row) => [row.name, row.depth, row.isDirectory])).toEqual([
            ['A.md', 0, false],
            ['b.txt', 0, false],
            ['sub', 0, true],
            ['inner.txt', 1, false],
        ]);
        expect(view.header).toBe(`${path.basename(dir)} (line 1-4 of 4)`);
        expect(view.atEnd).toBe(true);
    });

    it('labels file sizes and leaves directories without one', async () => {
        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 0 });
        const [a, b, sub] = entries(view.rows);

        expect(a.sizeLabel).toBe('2B');
        expect(b.sizeLabel).toBe('5B');
        expect(sub.sizeLabel).toBeUndefined();
    });

    it('badges new and edited files', async () => {
        ledger.record(path.join(dir, 'A.md'), 'modified', 1_000);
        ledger.record(path.join(dir, 'b.txt'), 'created', 1_000);

        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 2_000 });
        const [a, b] = entries(view.rows);

        expect(a.badges).toEqual(['edited']);
        expect(a.style.color).toBe('bright-red');
        expect(b.badges).toEqual(['new']);
        expect(b.style.color).toBe('bright-green');
    });

    it('shows a tombstone for a deleted file until its window closes', async () => {
        const gone = path.join(dir, 'gone.txt');
        ledger.record(gone, 'deleted', 10_000);

        const during = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 11_000 });
        const tombstone = entries(during.rows).at(-1);
        expect(tombstone).toMatchObject({
            path: gone,
            name: 'gone.txt',
            depth: 0,
            badges: ['deleted'],
            style: DELETED_STYLE,
            sizeLabel: undefined,
        });
        expect(during.totalRows).toBe(5);

        const after = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 40_000 });
        expect(after.totalRows).toBe(4);
    });

    it('places tombstones under their parent directory', async () => {
        ledger.record(path.join(dir, 'sub', 'old.txt'), 'deleted', 0);

        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 1 });

        expect(entries(view.rows).map((row) => row.name)).toEqual(['A.md', 'b.txt', 'sub', 'inner.txt', 'old.txt']);
        expect(entries(view.rows)[4].depth).toBe(1);
    });

    it('numbers files with pending diffs in traversal order', async () => {
        const a = path.join(dir, 'A.md');
        const inner = path.join(dir, 'sub', 'inner.txt');
        store.onSeen(a, 'old\n');
        store.onSeen(inner, 'old\n');
        await store.onModifiedOrCreated(a, 'modified');
        await store.onModifiedOrCreated(inner, 'modified');

        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 0 });

        expect([...view.diffIndex]).toEqual([[1, a], [2, inner]]);
        expect(entries(view.rows).map((row) => row.diffIndex)).toEqual([1, undefined, undefined, 2]);
        expect(view.rowPosition(inner)).toBe(3);
    });

    it('stops descending at maxDepth', async () => {
        const view = await buildTreeView({ root: dir, ledger, store, viewport: viewport(), now: 0, maxDepth: 1 });
        expect(entries(view.rows).map((row) => row.name)).toEqual(['A.md', 'b.txt', 'sub']);
    });

    it('clamps a scroll offset past the end and slices the window', async () => {
        const big = await mkdtemp(path.join(os.tmpdir(), 'filepulse-big-'));
        try {
            for (let i = 0; i < 100; i += 1) {
                await writeFile(path.join(big, `f${String(i).padStart(3, '0')}.txt`), '');
            }

            const view = await buildTreeView({ root: big, ledger, store, viewport: viewport(85, 30), now: 0 });

            expect(view.scrollOffset).toBe(70);
            expect(view.rows).toHaveLength(30);
            expect(entries(view.rows)[0].name).toBe('f070.txt');
            expect(view.header).toBe(`${path.basename(big)} (line 71-100 of 100)`);
            expect(view.atEnd).toBe(true);

            const top = await buildTreeView({ root: big, ledger, store, viewport: viewport(0, 30), now: 0 });
            expect(top.header).toBe(`${path.basename(big)} (line 1-30 of 100)`);
            expect(top.atEnd).toBe(false);
        } finally {
            await rm(big, { recursive: true, force: true });
        }
    });

    it('reports an empty directory', async () => {
        const empty = path.join(dir, 'sub-empty');
        await mkdir(empty);

        const view = await buildTreeView({ root: empty, ledger, store, viewport: viewport(), now: 0 });

        expect(view.header).toBe('sub-empty (empty)');
        expect(view.totalRows).toBe(0);
        expect(view.atEnd).toBe(false);
    });

    it('degrades when the root is missing', async () => {
        const missing = path.join(dir, 'nowhere');
        const view = await buildTreeView({ root: missing, ledger, store, viewport: viewport(), now: 0 });

        expect(view.rootMissing).toBe(true);
        expect(view.rows).toEqual([]);
        expect(view.header).toBe(`Directory not found: ${missing}`);
    });
});

describe('walkTree', () => {
    it('turns unreadable directories into error rows', async () => {
        const rows: Array<WalkEntry | ErrorRow> = [];
        for await (const row of walkTree(path.join(os.tmpdir(), 'filepulse-does-not-exist'), new EventLedger(), 0)) {
            rows.push(row);
        }
        expect(rows).toEqual([{ type: 'error', depth: 0, message: 'Directory not found' }]);
    });

    it('describes other read failures', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'filepulse-walk-'));
        const file = path.join(dir, 'plain.txt');
        await writeFile(file, '');
        try {
            const rows: Array<WalkEntry | ErrorRow> = [];
            for await (const row of walkTree(file, new EventLedger(), 0)) {
                rows.push(row);
            }
            expect(rows).toHaveLength(1);
            const [first] = rows;
            expect(first).toMatchObject({ type: 'error', depth: 0 });
            expect(first.type === 'error' ? first.message : '').toMatch(/^Error accessing directory: ENOTDIR/);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

describe('clampScrollOffset', () => {
    it('keeps the offset inside the scrollable range', () => {
        expect(clampScrollOffset(-4, 100, 30)).toBe(0);
        expect(clampScrollOffset(85, 100, 30)).toBe(70);
        expect(clampScrollOffset(10, 5, 30)).toBe(0);
        expect(clampScrollOffset(12, 100, 30)).toBe(12);
    });
});

describe('formatSize', () => {
    it('uses B, KB and MB', () => {
        expect(formatSize(123)).toBe('123B');
        expect(formatSize(1536)).toBe('1.5KB');
        expect(formatSize(2 * 1024 * 1024)).toBe('2.0MB');
    });
});
