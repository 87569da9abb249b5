import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type {
    EntryRow,
    ErrorRow,
    RowBadge,
    TreeRow,
    TreeView,
    ViewportState,
} from '../types/dashboard.js';
import type { ContentStore } from './content-store.js';
import type { EventLedger } from './event-ledger.js';
import { classifyRecency } from './recency-classifier.js';

export const DEFAULT_MAX_DEPTH = 10;

export interface TreeViewInput {
    root: string;
    ledger: EventLedger;
    store: ContentStore;
    viewport: ViewportState;
    now: number;
    maxDepth?: number;
}

/** One node found by the walk, before styling. */
export interface WalkEntry {
    type: 'entry';
    path: string;
    name: string;
    depth: number;
    isDirectory: boolean;
    /** False for tombstones of recently deleted paths. */
    exists: boolean;
}

interface WalkContext {
    ledger: EventLedger;
    now: number;
    maxDepth: number;
}

/** Keep `offset` inside `[0, max(0, totalRows - visibleRows)]`. */
export function clampScrollOffset(offset: number, totalRows: number, visibleRows: number): number {
    const maxOffset = Math.max(0, totalRows - Math.max(1, visibleRows));
    return Math.min(Math.max(0, Math.floor(offset)), maxOffset);
}

export function formatSize(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Depth-first, pre-order walk of `root`. Files come before directories,
 * names compare case-insensitively, dot entries are skipped, and recently
 * deleted paths are appended to their parent as tombstones.
 * Read failures surface as error rows instead of ending the walk.
 */
export async function* walkTree(
    root: string,
    ledger: EventLedger,
    now: number,
    maxDepth: number = DEFAULT_MAX_DEPTH,
): AsyncGenerator<WalkEntry | ErrorRow> {
    yield* walkDirectory(path.resolve(root), 0, { ledger, now, maxDepth });
}

async function* walkDirectory(
    dir: string,
    depth: number,
    context: WalkContext,
): AsyncGenerator<WalkEntry | ErrorRow> {
    if (depth >= context.maxDepth) return;

    let dirents: Dirent[];
    try {
        dirents = await readdir(dir, { withFileTypes: true });
    } catch (err) {
        yield { type: 'error', depth, message: describeTraversalError(err) };
        return;
    }

    const live: WalkEntry[] = [];
    for (const dirent of dirents) {
        if (dirent.name.startsWith('.')) continue;
        const entryPath = path.join(dir, dirent.name);
        live.push({
            type: 'entry',
            path: entryPath,
            name: dirent.name,
            depth,
            isDirectory: await resolveIsDirectory(dirent, entryPath),
            exists: true,
        });
    }
    live.sort(compareEntries);

    const livePaths = new Set(live.map((entry) => entry.path));
    const tombstones: WalkEntry[] = context.ledger
        .recentlyDeleted(context.now)
        .filter((mark) => path.dirname(mark.path) === dir && !livePaths.has(mark.path))
        .map((mark) => ({
            type: 'entry' as const,
            path: mark.path,
            name: path.basename(mark.path),
            depth,
            isDirectory: mark.isDirectory,
            exists: false,
        }))
        .filter((entry) => !entry.name.startsWith('.'))
        .sort(compareEntries);

    for (const entry of live) {
        yield entry;
        if (entry.isDirectory) {
            yield* walkDirectory(entry.path, depth + 1, context);
        }
    }
    yield* tombstones;
}

/**
 * Build the paginated tree for one frame. Diff indices are assigned over
 * the whole tree in traversal order and are only valid for this result.
 */
export async function buildTreeView(input: TreeViewInput): Promise<TreeView> {
    const root = path.resolve(input.root);
    const rootName = path.basename(root) || root;
    const { ledger, store, now } = input;

    if (!(await isDirectory(root))) {
        return {
            rootName,
            rootMissing: true,
            rows: [],
            totalRows: 0,
            scrollOffset: 0,
            header: `Directory not found: ${root}`,
            atEnd: false,
            diffIndex: new Map(),
            rowPosition: () => undefined,
        };
    }

    const rows: TreeRow[] = [];
    const diffIndex = new Map<number, string>();
    const positions = new Map<string, number>();

    for await (const item of walkTree(root, ledger, now, input.maxDepth ?? DEFAULT_MAX_DEPTH)) {
        if (item.type === 'error') {
            rows.push(item);
            continue;
        }

        const row = await toEntryRow(item, ledger, store, now);
        if (row.hasDiff) {
            row.diffIndex = diffIndex.size + 1;
            diffIndex.set(row.diffIndex, row.path);
        }
        positions.set(row.path, rows.length);
        rows.push(row);
    }

    const visible = Math.max(1, Math.floor(input.viewport.visibleRowCount));
    const totalRows = rows.length;
    const scrollOffset = clampScrollOffset(input.viewport.scrollOffset, totalRows, visible);
    const end = Math.min(scrollOffset + visible, totalRows);

    return {
        rootName,
        rootMissing: false,
        rows: rows.slice(scrollOffset, end),
        totalRows,
        scrollOffset,
        header: totalRows === 0
            ? `${rootName} (empty)`
            : `${rootName} (line ${scrollOffset + 1}-${end} of ${totalRows})`,
        atEnd: totalRows > 0 && end >= totalRows,
        diffIndex,
        rowPosition: (target: string) => positions.get(path.resolve(target)),
    };
}

async function toEntryRow(
    entry: WalkEntry,
    ledger: EventLedger,
    store: ContentStore,
    now: number,
): Promise<EntryRow> {
    const badges: RowBadge[] = [];
    if (!entry.exists) {
        badges.push('deleted');
    } else if (ledger.isCreatedRecently(entry.path, now)) {
        badges.push('new');
    } else if (!entry.isDirectory && ledger.latest(entry.path)?.kind === 'modified') {
        badges.push('edited');
    }

    let sizeLabel: string | undefined;
    if (entry.exists && !entry.isDirectory) {
        try {
            sizeLabel = formatSize((await stat(entry.path)).size);
        } catch {
            // vanished between readdir and stat
            sizeLabel = undefined;
        }
    }

    return {
        type: 'entry',
        path: entry.path,
        name: entry.name,
        depth: entry.depth,
        isDirectory: entry.isDirectory,
        style: classifyRecency(entry.path, ledger, now),
        badges,
        sizeLabel,
        hasDiff: !entry.isDirectory && store.hasPendingDiff(entry.path),
    };
}

function compareEntries(a: WalkEntry, b: WalkEntry): number {
    if (a.isDirectory !== b.isDirectory) {
        return a.isDirectory ? 1 : -1;
    }
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
}

async function resolveIsDirectory(dirent: Dirent, entryPath: string): Promise<boolean> {
    if (dirent.isDirectory()) return true;
    if (!dirent.isSymbolicLink()) return false;
    return isDirectory(entryPath);
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isDirectory();
    } catch {
        return false;
    }
}

function describeTraversalError(err: unknown): string {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'EACCES' || code === 'EPERM') return 'Permission denied';
    if (code === 'ENOENT') return 'Directory not found';
    const message = err instanceof Error ? err.message : String(err);
    return `Error accessing directory: ${message}`;
}
