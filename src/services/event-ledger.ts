import path from 'node:path';
import type { ChangeRecord, ChangeSummary, DeletionMark } from '../types/dashboard.js';
import type { ChangeKind } from '../types/file-watcher.js';

export const CREATED_WINDOW_MS = 10_000;
export const DELETED_WINDOW_MS = 30_000;
export const SUMMARY_WINDOW_MS = 30_000;

export interface RecentEvent {
    path: string;
    kind: ChangeKind;
    observedAt: number;
}

/**
 * Latest change per path, plus creation and deletion marks that outlive
 * later events for the same path (a create followed by a modify still
 * reads as new).
 */
export class EventLedger {
    readonly #changes: Map<string, ChangeRecord> = new Map();
    readonly #created: Map<string, number> = new Map();
    readonly #deleted: Map<string, DeletionMark> = new Map();
    #mostRecent: RecentEvent | undefined;

    record(filePath: string, kind: ChangeKind, now: number, isDirectory = false): void {
        const key = path.resolve(filePath);
        this.#changes.set(key, { kind, observedAt: now });

        if (kind === 'created') {
            this.#created.set(key, now);
        } else if (kind === 'deleted') {
            this.#deleted.set(key, { observedAt: now, isDirectory });
        }

        this.#mostRecent = { path: key, kind, observedAt: now };
    }

    latest(filePath: string): ChangeRecord | undefined {
        return this.#changes.get(path.resolve(filePath));
    }

    isRecent(filePath: string, withinMs: number, now: number): boolean {
        const record = this.latest(filePath);
        return record !== undefined && now - record.observedAt < withinMs;
    }

    isCreatedRecently(filePath: string, now: number): boolean {
        const key = path.resolve(filePath);
        const record = this.#changes.get(key);
        if (record?.kind === 'created' && now - record.observedAt < CREATED_WINDOW_MS) {
            return true;
        }
        const mark = this.#created.get(key);
        return mark !== undefined && now - mark < CREATED_WINDOW_MS;
    }

    isDeletedRecently(filePath: string, now: number): boolean {
        const mark = this.#deleted.get(path.resolve(filePath));
        return mark !== undefined && now - mark.observedAt < DELETED_WINDOW_MS;
    }

    /** Paths still inside their tombstone window. */
    recentlyDeleted(now: number): Array<{ path: string } & DeletionMark> {
        const result: Array<{ path: string } & DeletionMark> = [];
        for (const [key, mark] of this.#deleted) {
            if (now - mark.observedAt < DELETED_WINDOW_MS) {
                result.push({ path: key, ...mark });
            }
        }
        return result;
    }

    mostRecent(): RecentEvent | undefined {
        return this.#mostRecent;
    }

    summarize(now: number, windowMs: number = SUMMARY_WINDOW_MS): ChangeSummary {
        let created = 0;
        let modified = 0;
        for (const record of this.#changes.values()) {
            if (now - record.observedAt >= windowMs) continue;
            if (record.kind === 'created') created += 1;
            else if (record.kind === 'modified') modified += 1;
        }

        let deleted = 0;
        for (const mark of this.#deleted.values()) {
            if (now - mark.observedAt < windowMs) deleted += 1;
        }

        return { created, modified, deleted };
    }

    clear(): void {
        this.#changes.clear();
        this.#created.clear();
        this.#deleted.clear();
        this.#mostRecent = undefined;
    }
}
