/** Kinds of filesystem change the dashboard distinguishes. */
export type ChangeKind = 'created' | 'modified' | 'deleted';

/** Normalized filesystem event payload. */
export interface WatchEvent {
    kind: ChangeKind;
    /** Absolute path of the affected file or directory. */
    path: string;
    isDirectory: boolean;
}

/** Callback invoked when a watched filesystem event occurs. */
export type WatchEventListener = (event: WatchEvent) => Promise<void> | void;

/** Options for a recursive watch subscription. */
export interface WatchOptions {
    /** Glob patterns (or absolute paths) to ignore. */
    exclude?: string[];
    /** Milliseconds a file size must hold still before `modified` is emitted. 0 disables. */
    stabilityThresholdMs?: number;
}

/**
 * Source of filesystem events for one root at a time.
 * `subscribe` replaces any earlier subscription.
 */
export interface WatchSource {
    subscribe(root: string, listener: WatchEventListener, options?: WatchOptions): Promise<void>;
    unsubscribe(): Promise<void>;
    readonly active: boolean;
}
