import path from 'node:path';
import type { ChangeSummary, DiffLine, EntryRow, TreeRow, TreeView } from '../types/dashboard.js';
import type {
    DashboardDocument,
    DocumentBlock,
    SpanStyle,
    StyledLine,
    StyledSpan,
} from '../types/document.js';
import type { RecentEvent } from '../services/event-ledger.js';
import { formatDiffLine } from '../services/content-store.js';

export interface DocumentInput {
    root: string;
    rootAvailable: boolean;
    view: TreeView;
    summary: ChangeSummary;
    chimeEnabled: boolean;
    now: number;
    viewportHeight: number;
    selectedDiff?: { path: string; lines: DiffLine[] };
    mostRecent?: RecentEvent;
    /** Digits typed so far towards a diff selection. */
    pendingDigits?: string;
}

const span = (text: string, style?: SpanStyle): StyledSpan => (style ? { text, style } : { text });

/** Assemble the four blocks of one frame from already-computed state. */
export function composeDocument(input: DocumentInput): DashboardDocument {
    const blocks: DocumentBlock[] = [statusBlock(input), treeBlock(input)];
    if (input.selectedDiff) {
        blocks.push(diffBlock(input.selectedDiff));
    }
    blocks.push(instructionsBlock(input));
    return { blocks, viewportHeight: input.viewportHeight };
}

function statusBlock(input: DocumentInput): DocumentBlock {
    const chime = input.chimeEnabled
        ? span('ON', { color: 'green' })
        : span('OFF', { color: 'red' });

    if (!input.rootAvailable) {
        return {
            id: 'status',
            title: 'File System Monitor',
            tone: 'alert',
            lines: [
                [span('Monitoring: '), span(input.root, { color: 'red' }), span(' DIRECTORY DELETED', { color: 'red', bold: true })],
                [span('⚠️ The monitored directory has been deleted or moved!', { color: 'yellow' })],
                [span('Chime: '), chime],
            ],
        };
    }

    const { created, modified, deleted } = input.summary;
    return {
        id: 'status',
        title: 'File System Monitor',
        tone: 'normal',
        lines: [
            [span('Monitoring: '), span(input.root, { color: 'cyan' })],
            [
                span('Created: '), span(String(created), { color: 'bright-green' }),
                span(' | Modified: '), span(String(modified), { color: 'red' }),
                span(' | Deleted: '), span(String(deleted), { color: 'dim-red' }),
                span(' | Chime: '), chime,
            ],
        ],
    };
}

function treeBlock(input: DocumentInput): DocumentBlock {
    const { view } = input;

    if (view.rootMissing || !input.rootAvailable) {
        return {
            id: 'tree',
            title: 'Directory Tree',
            tone: 'alert',
            lines: [
                [span(`❌ Directory not found: ${input.root}`, { color: 'red', bold: true })],
                [span('The monitored directory has been deleted or moved', { color: 'dim-red' })],
                [span('Press Ctrl+C to change to a different directory', { color: 'yellow', dim: true })],
            ],
        };
    }

    const lines: StyledLine[] = [[span(`📁 ${view.header}`, { color: 'blue', bold: true })]];
    for (const row of view.rows) {
        lines.push(rowLine(row));
    }
    if (view.atEnd) {
        lines.push([span('📁 End of directory tree', { color: 'cyan', dim: true })]);
    }

    return { id: 'tree', title: 'Directory Tree', tone: 'normal', lines };
}

export function rowLine(row: TreeRow): StyledLine {
    const indent = '  '.repeat(row.depth);
    if (row.type === 'error') {
        return [span(indent), span(row.message, { color: 'dim-red' })];
    }

    const line: StyledLine = [span(indent)];
    if (row.diffIndex !== undefined) {
        line.push(span(`[${row.diffIndex}] `, { color: 'cyan', bold: true }));
    }
    line.push(span(`${rowIcon(row)} `));
    line.push(span(row.isDirectory ? `${row.name}/` : row.name, {
        color: row.style.color,
        strike: row.style.strike,
    }));
    if (row.badges.includes('new')) {
        line.push(span(' [NEW]', { color: 'green', bold: true }));
    }
    if (row.badges.includes('edited')) {
        line.push(span(' [EDITED]', { color: 'yellow', bold: true }));
    }
    if (row.sizeLabel) {
        line.push(span(` (${row.sizeLabel})`, { dim: true }));
    }
    return line;
}

function rowIcon(row: EntryRow): string {
    if (row.badges.includes('deleted')) return '🗑️';
    return row.isDirectory ? '📁' : '📄';
}

function diffBlock(selected: { path: string; lines: DiffLine[] }): DocumentBlock {
    const lines = selected.lines.map((line): StyledLine => {
        const text = formatDiffLine(line);
        switch (line.kind) {
            case 'header':
                return [span(text, { color: 'blue', bold: true })];
            case 'hunk':
                return [span(text, { color: 'cyan', bold: true })];
            case 'insert':
                return [span(text, { color: 'green' })];
            case 'delete':
                return [span(text, { color: 'red' })];
            default:
                return [span(text, { dim: true })];
        }
    });

    return {
        id: 'diff',
        title: `Diff for ${path.basename(selected.path)}`,
        tone: 'diff',
        lines,
    };
}

function instructionsBlock(input: DocumentInput): DocumentBlock {
    const menu: StyledLine = [span('Press Ctrl+C to access menu (change path, toggle chime, exit)', { dim: true })];
    if (input.view.diffIndex.size > 0) {
        menu.push(span(' • Type a number ', { dim: true }));
        menu.push(span(`[1-${input.view.diffIndex.size}]`, { color: 'cyan', bold: true }));
        menu.push(span(' and Enter to view a diff', { dim: true }));
    }
    if (input.pendingDigits) {
        menu.push(span(` • Diff #${input.pendingDigits}`, { color: 'cyan' }));
    }
    if (input.selectedDiff) {
        menu.push(span(" • Press 'q' to close diff", { dim: true }));
    }

    const navigation: StyledLine = [
        span('Navigation: ', { dim: true }),
        span('W/↑', { color: 'cyan' }), span(' scroll up, ', { dim: true }),
        span('S/↓', { color: 'cyan' }), span(' scroll down, ', { dim: true }),
        span('PgUp', { color: 'cyan' }), span(' page up, ', { dim: true }),
        span('PgDn', { color: 'cyan' }), span(' page down', { dim: true }),
    ];

    const recent: StyledLine = input.mostRecent
        ? [
            span('📄 Most Recent Event: ', { color: 'yellow', bold: true }),
            span(path.basename(input.mostRecent.path), { color: 'magenta', bold: true }),
            span(` (${formatAgo(input.now - input.mostRecent.observedAt)})`),
            span(' - Press ', { dim: true }), span('F', { color: 'cyan' }), span(' to jump', { dim: true }),
        ]
        : [span('No recent file events', { dim: true })];

    return { id: 'instructions', title: '', tone: 'muted', lines: [menu, navigation, recent] };
}

export function formatAgo(elapsedMs: number): string {
    const seconds = Math.max(0, elapsedMs) / 1000;
    if (seconds < 60) return `${Math.floor(seconds)}s ago`;
    if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
    return `${Math.floor(seconds / 3600)}h ago`;
}
