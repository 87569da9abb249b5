import type { BlockTone, DocumentBlock, SpanColor, StyledLine, StyledSpan } from '../types/document.js';

const COLOR_HEX: Record<SpanColor, string | undefined> = {
    default: undefined,
    white: '#ffffff',
    'dim-red': '#870000',
    'bright-green': '#00ff00',
    green: '#00af00',
    'dark-green': '#005f00',
    'bright-red': '#ff0000',
    red: '#d70000',
    yellow: '#ffff00',
    orange: '#ff8700',
    blue: '#5f87ff',
    cyan: '#00d7d7',
    magenta: '#d700d7',
};

const DIM_HEX = '#808080';

const TONE_BORDER: Record<BlockTone, string> = {
    normal: 'green',
    alert: 'red',
    diff: 'yellow',
    muted: 'gray',
};

/** Neutralise blessed's `{...}` tag syntax inside user text. */
export function escapeTags(text: string): string {
    return text.replace(/[{}]/g, (ch) => (ch === '{' ? '{open}' : '{close}'));
}

/** blessed has no strike attribute; overlay U+0336 on every character instead. */
export function strikeThrough(text: string): string {
    return [...text].map((ch) => `${ch}\u0336`).join('');
}

export function spanToMarkup(span: StyledSpan): string {
    const style = span.style ?? {};
    const text = escapeTags(style.strike ? strikeThrough(span.text) : span.text);

    const tags: string[] = [];
    const hex = style.color ? COLOR_HEX[style.color] : undefined;
    if (hex) {
        tags.push(`${hex}-fg`);
    } else if (style.dim) {
        tags.push(`${DIM_HEX}-fg`);
    }
    if (style.bold) {
        tags.push('bold');
    }

    const open = tags.map((tag) => `{${tag}}`).join('');
    const close = [...tags].reverse().map((tag) => `{/${tag}}`).join('');
    return `${open}${text}${close}`;
}

export function lineToMarkup(line: StyledLine): string {
    return line.map(spanToMarkup).join('');
}

export function blockToMarkup(block: DocumentBlock): string {
    return block.lines.map(lineToMarkup).join('\n');
}

export function borderColor(tone: BlockTone): string {
    return TONE_BORDER[tone];
}
