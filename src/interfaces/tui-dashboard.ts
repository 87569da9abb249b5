import blessed from 'blessed';
import type { NavigationCommand } from '../types/dashboard.js';
import type { BlockId, DashboardDocument, DocumentBlock, DocumentRenderer } from '../types/document.js';
import { blockToMarkup, borderColor, escapeTags } from './markup.js';

export interface TerminalCallbacks {
    onNavigate(command: NavigationCommand): void;
    onDigits(buffer: string): void;
    onInterrupt(): void;
}

const STATUS_HEIGHT = 5;
const INSTRUCTIONS_HEIGHT = 5;
// status + instructions + borders + breathing room
const CHROME_ROWS = 16;
const MIN_VISIBLE_ROWS = 10;
// tree box borders, header line and end-of-tree marker
const TREE_BOX_CHROME = 4;
const DIGITS = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];

/** Rows between the status and instructions boxes. */
function middleHeight(screenHeight: number): number {
    return Math.max(2, screenHeight - STATUS_HEIGHT - INSTRUCTIONS_HEIGHT);
}

/**
 * Tree rows that fit on a screen of `screenHeight` lines. With a diff open
 * the tree box gets the upper half of the middle area.
 */
export function treeRowCapacity(screenHeight: number, withDiff: boolean): number {
    if (withDiff) {
        return Math.max(1, Math.floor(middleHeight(screenHeight) / 2) - TREE_BOX_CHROME);
    }
    return Math.max(MIN_VISIBLE_ROWS, screenHeight - CHROME_ROWS);
}

/**
 * Full-screen blessed view of the dashboard: status, tree, optional diff
 * and instructions boxes, redrawn from each `DashboardDocument`.
 */
export class TerminalDashboard implements DocumentRenderer {
    readonly #screen: blessed.Widgets.Screen;
    readonly #boxes: Record<BlockId, blessed.Widgets.BoxElement>;
    readonly #callbacks: TerminalCallbacks;
    #digits = '';
    #destroyed = false;

    constructor(callbacks: TerminalCallbacks) {
        this.#callbacks = callbacks;
        this.#screen = blessed.screen({ smartCSR: true, fullUnicode: true, title: 'File System Monitor' });

        const frame = (options: blessed.Widgets.BoxOptions) =>
            blessed.box({
                parent: this.#screen,
                left: 0,
                width: '100%',
                tags: true,
                border: { type: 'line' },
                ...options,
            });

        this.#boxes = {
            status: frame({ top: 0, height: STATUS_HEIGHT }),
            tree: frame({ top: STATUS_HEIGHT, bottom: INSTRUCTIONS_HEIGHT }),
            diff: frame({ top: STATUS_HEIGHT, height: 1, hidden: true, scrollable: true }),
            instructions: frame({ bottom: 0, height: INSTRUCTIONS_HEIGHT }),
        };

        this.#bindKeys();
    }

    visibleRows(withDiff: boolean): number {
        return treeRowCapacity(Number(this.#screen.height), withDiff);
    }

    render(document: DashboardDocument): void {
        if (this.#destroyed) return;

        const diff = document.blocks.find((block) => block.id === 'diff');
        this.#layout(diff !== undefined);

        for (const block of document.blocks) {
            this.#fill(block);
        }
        if (!diff) {
            this.#boxes.diff.hide();
        }

        this.#screen.render();
    }

    destroy(): void {
        if (this.#destroyed) return;
        this.#destroyed = true;
        this.#screen.destroy();
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #fill(block: DocumentBlock): void {
        const box = this.#boxes[block.id];
        box.setLabel(block.title ? ` ${escapeTags(block.title)} ` : '');
        box.setContent(blockToMarkup(block));
        box.style.border = { fg: borderColor(block.tone) };
        box.show();
    }

    #layout(withDiff: boolean): void {
        const available = middleHeight(Number(this.#screen.height));
        const tree = this.#boxes.tree;
        const diff = this.#boxes.diff;

        if (withDiff) {
            const treeHeight = Math.floor(available / 2);
            tree.height = treeHeight;
            diff.top = STATUS_HEIGHT + treeHeight;
            diff.height = available - treeHeight;
        } else {
            tree.height = available;
        }
    }

    #bindKeys(): void {
        const nav = (command: NavigationCommand) => () => this.#callbacks.onNavigate(command);

        this.#screen.key(['w', 'up'], nav({ type: 'scroll-up' }));
        this.#screen.key(['s', 'down'], nav({ type: 'scroll-down' }));
        this.#screen.key(['pageup'], nav({ type: 'page-up' }));
        this.#screen.key(['pagedown'], nav({ type: 'page-down' }));
        this.#screen.key(['f', 'S-f'], nav({ type: 'jump-to-most-recent' }));
        this.#screen.key(['q', 'S-q'], nav({ type: 'close-diff' }));

        for (const digit of DIGITS) {
            this.#screen.key([digit], () => this.#setDigits(this.#digits + digit));
        }
        this.#screen.key(['backspace'], () => this.#setDigits(this.#digits.slice(0, -1)));
        this.#screen.key(['escape'], () => this.#setDigits(''));
        this.#screen.key(['enter'], () => {
            const index = Number.parseInt(this.#digits, 10);
            this.#setDigits('');
            if (Number.isInteger(index)) {
                this.#callbacks.onNavigate({ type: 'select-diff', index });
            }
        });

        this.#screen.key(['C-c'], () => this.#callbacks.onInterrupt());
    }

    #setDigits(value: string): void {
        this.#digits = value;
        this.#callbacks.onDigits(value);
    }
}
