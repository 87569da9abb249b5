import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { structuredPatch, type Hunk } from 'diff';
import type { DiffLine } from '../types/dashboard.js';
import type { ChangeKind } from '../types/file-watcher.js';
import { isTrackable } from './text-classifier.js';

interface ContentSnapshot {
    /** Set once per record, never overwritten. */
    baseline: string;
    current: string;
}

const DIFF_CONTEXT_LINES = 3;

/**
 * Per-path content history: a fixed baseline and the latest content.
 * Diffs always run baseline → current.
 */
export class ContentStore {
    readonly #snapshots: Map<string, ContentSnapshot> = new Map();

    get size(): number {
        return this.#snapshots.size;
    }

    has(filePath: string): boolean {
        return this.#snapshots.has(path.resolve(filePath));
    }

    /** True when `diff` would return lines. */
    hasPendingDiff(filePath: string): boolean {
        const snapshot = this.#snapshots.get(path.resolve(filePath));
        return snapshot !== undefined && snapshot.baseline !== snapshot.current;
    }

    /** Initial scan: remember pre-existing content as both baseline and current. */
    onSeen(filePath: string, text: string): void {
        const key = path.resolve(filePath);
        if (this.#snapshots.has(key)) return;
        this.#snapshots.set(key, { baseline: text, current: text });
    }

    /**
     * Re-read a file after a create/modify event.
     * Returns false when the file is not tracked or could not be read;
     * the store is left untouched in that case.
     */
    async onModifiedOrCreated(filePath: string, kind: Exclude<ChangeKind, 'deleted'>): Promise<boolean> {
        const key = path.resolve(filePath);
        if (!(await isTrackable(key))) return false;

        let text: string;
        try {
            text = await readFile(key, 'utf8');
        } catch {
            return false;
        }

        const existing = this.#snapshots.get(key);
        if (existing) {
            existing.current = text;
            return true;
        }

        // First sighting: a freshly created file starts from what it held
        // when it appeared; an unknown file that changed starts empty.
        const baseline = kind === 'created' ? text : '';
        this.#snapshots.set(key, { baseline, current: text });
        return true;
    }

    /** Unified diff of baseline → current, or undefined when there is nothing to show. */
    diff(filePath: string): DiffLine[] | undefined {
        const key = path.resolve(filePath);
        const snapshot = this.#snapshots.get(key);
        if (!snapshot || snapshot.baseline === snapshot.current) return undefined;

        const name = path.basename(key);
        const patch = structuredPatch(
            `${name} (before)`,
            `${name} (after)`,
            snapshot.baseline,
            snapshot.current,
            undefined,
            undefined,
            { context: DIFF_CONTEXT_LINES },
        );
        if (patch.hunks.length === 0) return undefined;

        const lines: DiffLine[] = [
            { kind: 'header', text: `--- ${name} (before)` },
            { kind: 'header', text: `+++ ${name} (after)` },
        ];
        for (const hunk of patch.hunks) {
            lines.push({ kind: 'hunk', text: hunkHeader(hunk) });
            for (const raw of hunk.lines) {
                lines.push(toDiffLine(raw));
            }
        }
        return lines;
    }

    clear(): void {
        this.#snapshots.clear();
    }
}

/** An empty range sits after the line it names, so its start is one lower. */
function hunkHeader(hunk: Pick<Hunk, 'oldStart' | 'oldLines' | 'newStart' | 'newLines'>): string {
    const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
    const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
    return `@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`;
}

function toDiffLine(raw: string): DiffLine {
    switch (raw.charAt(0)) {
        case '+':
            return { kind: 'insert', text: raw.slice(1) };
        case '-':
            return { kind: 'delete', text: raw.slice(1) };
        case ' ':
            return { kind: 'context', text: raw.slice(1) };
        default:
            // "\ No newline at end of file" and similar markers
            return { kind: 'context', text: raw };
    }
}

/** Render a diff line back to unified-diff text. */
export function formatDiffLine(line: DiffLine): string {
    switch (line.kind) {
        case 'insert':
            return `+${line.text}`;
        case 'delete':
            return `-${line.text}`;
        case 'context':
            return line.text.startsWith('\\') ? line.text : ` ${line.text}`;
        default:
            return line.text;
    }
}
