import { describe, expect, it } from 'vitest';
import {
    blockToMarkup,
    borderColor,
    escapeTags,
    lineToMarkup,
    spanToMarkup,
    strikeThrough,
} from '../../src/interfaces/markup.js';

describe('markup', () => {
    it('escapes blessed tag braces in user text', () => {
        expect(escapeTags('{bold}x{/bold}')).toBe('{open}bold{close}x{open}/bold{close}');
    });

    it('overlays a combining stroke on every character', () => {
        expect(strikeThrough('ab')).toBe('a\u0336b\u0336');
    });

    it('leaves unstyled text bare', () => {
        expect(spanToMarkup({ text: 'plain' })).toBe('plain');
    });

    it('nests colour and bold tags and closes them in reverse', () => {
        expect(spanToMarkup({ text: 'a{b}', style: { color: 'red', bold: true } }))
            .toBe('{#d70000-fg}{bold}a{open}b{close}{/bold}{/#d70000-fg}');
    });

    it('renders dim as grey unless a colour is set', () => {
        expect(spanToMarkup({ text: 'x', style: { dim: true } })).toBe('{#808080-fg}x{/#808080-fg}');
        expect(spanToMarkup({ text: 'x', style: { dim: true, color: 'cyan' } })).toBe('{#00d7d7-fg}x{/#00d7d7-fg}');
        expect(spanToMarkup({ text: 'x', style: { color: 'default', bold: true } })).toBe('{bold}x{/bold}');
    });

    it('strikes through deleted names', () => {
        expect(spanToMarkup({ text: 'ab', style: { color: 'dim-red', strike: true } }))
            .toBe('{#870000-fg}a\u0336b\u0336{/#870000-fg}');
    });

    it('joins spans into lines and lines into blocks', () => {
        expect(lineToMarkup([{ text: 'a' }, { text: 'b', style: { bold: true } }])).toBe('a{bold}b{/bold}');
        expect(blockToMarkup({
            id: 'status',
            title: 'Status',
            tone: 'normal',
            lines: [[{ text: 'one' }], [{ text: 'two' }]],
        })).toBe('one\ntwo');
    });

    it('maps block tones to border colours', () => {
        expect(borderColor('normal')).toBe('green');
        expect(borderColor('alert')).toBe('red');
    });
});
