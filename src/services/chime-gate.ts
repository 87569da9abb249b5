export interface ChimeGateOptions {
    batchSize: number;
    cooldownMs: number;
    isolatedWindowMs: number;
    now?: () => number;
}

const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_COOLDOWN_MS = 1000;
const DEFAULT_ISOLATED_WINDOW_MS = 3000;

/**
 * Rate limiter for audible change notifications.
 *
 * A burst chimes roughly once per `batchSize` events; a lone change after a
 * quiet spell chimes straight away; nothing chimes twice inside `cooldownMs`.
 */
export class ChimeGate {
    readonly #batchSize: number;
    readonly #cooldownMs: number;
    readonly #isolatedWindowMs: number;
    readonly #now: () => number;
    #pendingCount = 0;
    #lastFiredAt: number;

    constructor(options: Partial<ChimeGateOptions> = {}) {
        this.#batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
        this.#cooldownMs = Math.max(0, options.cooldownMs ?? DEFAULT_COOLDOWN_MS);
        this.#isolatedWindowMs = Math.max(0, options.isolatedWindowMs ?? DEFAULT_ISOLATED_WINDOW_MS);
        this.#now = options.now ?? (() => Date.now());
        this.#lastFiredAt = this.#now();
    }

    get pendingCount(): number {
        return this.#pendingCount;
    }

    get lastFiredAt(): number {
        return this.#lastFiredAt;
    }

    /** Count one event; true when a chime should play for it. */
    onEvent(): boolean {
        const now = this.#now();
        this.#pendingCount += 1;
        const elapsed = now - this.#lastFiredAt;

        const wanted = this.#pendingCount >= this.#batchSize || elapsed > this.#isolatedWindowMs;
        if (wanted && elapsed >= this.#cooldownMs) {
            this.#pendingCount = 0;
            this.#lastFiredAt = now;
            return true;
        }
        return false;
    }

    reset(): void {
        this.#pendingCount = 0;
        this.#lastFiredAt = this.#now();
    }
}
