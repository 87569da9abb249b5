import type { NavigationCommand, ViewportState } from '../types/dashboard.js';
import { clampScrollOffset } from '../services/tree-view.js';

export const DEFAULT_SCROLL_STEP = 5;

export interface NavigationContext {
    /** Row count of the most recent build. */
    totalRows: number;
    scrollStep?: number;
    /** Diff index of the most recent build. */
    diffIndex: ReadonlyMap<number, string>;
    /** Row of the newest event's path in the most recent build. */
    mostRecentRow?: number;
}

/** Apply one keyboard command to the viewport. Pure; the input is not mutated. */
export function applyNavigation(
    state: ViewportState,
    command: NavigationCommand,
    context: NavigationContext,
): ViewportState {
    const visible = Math.max(1, state.visibleRowCount);
    const step = context.scrollStep ?? DEFAULT_SCROLL_STEP;
    const clamp = (offset: number) => clampScrollOffset(offset, context.totalRows, visible);

    switch (command.type) {
        case 'scroll-up':
            return { ...state, scrollOffset: clamp(state.scrollOffset - step) };
        case 'scroll-down':
            return { ...state, scrollOffset: clamp(state.scrollOffset + step) };
        case 'page-up':
            return { ...state, scrollOffset: clamp(state.scrollOffset - visible) };
        case 'page-down':
            return { ...state, scrollOffset: clamp(state.scrollOffset + visible) };
        case 'jump-to-most-recent': {
            if (context.mostRecentRow === undefined) return state;
            // leave a little context above the target row
            const lead = Math.min(5, Math.floor(visible / 4));
            return { ...state, scrollOffset: clamp(context.mostRecentRow - lead) };
        }
        case 'select-diff': {
            const target = context.diffIndex.get(command.index);
            return target === undefined ? state : { ...state, selectedDiffPath: target };
        }
        case 'close-diff':
            return { ...state, selectedDiffPath: undefined };
    }
}
