/**
 * Renderer-neutral description of one dashboard frame.
 * The terminal layer turns spans into its own markup.
 */

export type SpanColor =
    | 'default'
    | 'white'
    | 'dim-red'
    | 'bright-green'
    | 'green'
    | 'dark-green'
    | 'bright-red'
    | 'red'
    | 'yellow'
    | 'orange'
    | 'blue'
    | 'cyan'
    | 'magenta';

export interface SpanStyle {
    color?: SpanColor;
    bold?: boolean;
    dim?: boolean;
    strike?: boolean;
}

export interface StyledSpan {
    text: string;
    style?: SpanStyle;
}

export type StyledLine = StyledSpan[];

export type BlockId = 'status' | 'tree' | 'diff' | 'instructions';

export type BlockTone = 'normal' | 'alert' | 'diff' | 'muted';

export interface DocumentBlock {
    id: BlockId;
    title: string;
    tone: BlockTone;
    lines: StyledLine[];
}

export interface DashboardDocument {
    blocks: DocumentBlock[];
    /** Tree rows the renderer was asked to fit. */
    viewportHeight: number;
}

/** Anything that can draw a full frame and report how many tree rows fit. */
export interface DocumentRenderer {
    render(document: DashboardDocument): void;
    /** Tree rows that fit, given whether a diff shares the screen. */
    visibleRows(withDiff: boolean): number;
}
