import type { ChangeKind } from './file-watcher.js';

export type DashboardState = 'idle' | 'scanning' | 'monitoring' | 'suspended' | 'stopped';

export interface ChangeRecord {
    kind: ChangeKind;
    observedAt: number;
}

export interface DeletionMark {
    observedAt: number;
    isDirectory: boolean;
}

export interface ChangeSummary {
    created: number;
    modified: number;
    deleted: number;
}

// ── Recency ─────────────────────────────────────────────────────────────────

export type RecencyColor =
    | 'dim-red'
    | 'bright-green'
    | 'green'
    | 'dark-green'
    | 'bright-red'
    | 'red'
    | 'yellow'
    | 'orange'
    | 'default';

export type RecencyTier =
    | 'deleted'
    | 'created-hot'
    | 'created-warm'
    | 'created-cool'
    | 'modified-hot'
    | 'modified-warm'
    | 'modified-cool'
    | 'modified-fading'
    | 'idle';

export interface RecencyStyle {
    tier: RecencyTier;
    color: RecencyColor;
    strike: boolean;
}

// ── Diff ────────────────────────────────────────────────────────────────────

export type DiffLineKind = 'header' | 'hunk' | 'context' | 'insert' | 'delete';

/** One line of a unified diff. `text` carries no `+`/`-`/` ` prefix. */
export interface DiffLine {
    kind: DiffLineKind;
    text: string;
}

// ── Tree view ───────────────────────────────────────────────────────────────

export type RowBadge = 'new' | 'edited' | 'deleted';

export interface EntryRow {
    type: 'entry';
    path: string;
    name: string;
    depth: number;
    isDirectory: boolean;
    style: RecencyStyle;
    badges: RowBadge[];
    /** Human-readable size, omitted for directories and vanished paths. */
    sizeLabel?: string;
    hasDiff: boolean;
    diffIndex?: number;
}

export interface ErrorRow {
    type: 'error';
    depth: number;
    message: string;
}

export type TreeRow = EntryRow | ErrorRow;

export interface ViewportState {
    scrollOffset: number;
    visibleRowCount: number;
    selectedDiffPath?: string;
}

export interface TreeView {
    rootName: string;
    rootMissing: boolean;
    /** Rows inside the visible window only. */
    rows: TreeRow[];
    totalRows: number;
    /** Clamped offset actually used for the window. */
    scrollOffset: number;
    header: string;
    atEnd: boolean;
    /** Diff index → absolute path, over all rows. */
    diffIndex: Map<number, string>;
    /** Position of a path in the full row list, or undefined. */
    rowPosition(path: string): number | undefined;
}

// ── Navigation ──────────────────────────────────────────────────────────────

export type NavigationCommand =
    | { type: 'scroll-up' }
    | { type: 'scroll-down' }
    | { type: 'page-up' }
    | { type: 'page-down' }
    | { type: 'jump-to-most-recent' }
    | { type: 'select-diff'; index: number }
    | { type: 'close-diff' };

// ── Errors ──────────────────────────────────────────────────────────────────

export type ConfigurationErrorCode = 'root_missing' | 'root_not_directory';

/** Raised when monitoring cannot start on (or switch to) the requested root. */
export class ConfigurationError extends Error {
    readonly code: ConfigurationErrorCode;
    readonly path: string;

    constructor(code: ConfigurationErrorCode, path: string) {
        super(
            code === 'root_missing'
                ? `Directory does not exist: ${path}`
                : `Not a directory: ${path}`,
        );
        this.name = 'ConfigurationError';
        this.code = code;
        this.path = path;
    }
}
