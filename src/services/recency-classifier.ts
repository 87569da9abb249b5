import type { RecencyColor, RecencyStyle, RecencyTier } from '../types/dashboard.js';
import type { EventLedger } from './event-ledger.js';

interface TierStep {
    belowMs: number;
    tier: RecencyTier;
    color: RecencyColor;
}

const CREATED_STEPS: readonly TierStep[] = [
    { belowMs: 2_000, tier: 'created-hot', color: 'bright-green' },
    { belowMs: 5_000, tier: 'created-warm', color: 'green' },
    { belowMs: 10_000, tier: 'created-cool', color: 'dark-green' },
];

const MODIFIED_STEPS: readonly TierStep[] = [
    { belowMs: 2_000, tier: 'modified-hot', color: 'bright-red' },
    { belowMs: 5_000, tier: 'modified-warm', color: 'red' },
    { belowMs: 10_000, tier: 'modified-cool', color: 'yellow' },
    { belowMs: 30_000, tier: 'modified-fading', color: 'orange' },
];

export const IDLE_STYLE: RecencyStyle = { tier: 'idle', color: 'default', strike: false };
export const DELETED_STYLE: RecencyStyle = { tier: 'deleted', color: 'dim-red', strike: true };

/**
 * Map a path's latest change to its display tier.
 * A recent deletion wins over everything; windows are strict (`<`), so a
 * change exactly on a boundary drops to the cooler tier.
 */
export function classifyRecency(filePath: string, ledger: EventLedger, now: number): RecencyStyle {
    if (ledger.isDeletedRecently(filePath, now)) {
        return DELETED_STYLE;
    }

    const record = ledger.latest(filePath);
    if (!record) return IDLE_STYLE;

    const steps = record.kind === 'created'
        ? CREATED_STEPS
        : record.kind === 'modified'
            ? MODIFIED_STEPS
            : [];

    const elapsed = now - record.observedAt;
    const step = steps.find((candidate) => elapsed < candidate.belowMs);
    return step ? { tier: step.tier, color: step.color, strike: false } : IDLE_STYLE;
}
