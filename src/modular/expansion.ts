import type { SearchState } from '../mcts-state.js';
import type { StatisticsStore } from '../statistics-store.js';

/**
 * MCTS Expansion Phase Implementation
 *
 * Memoizes the successors of the leaf reached by selection. The successor relation
 * is treated as static: a state is asked for its successors at most once per engine,
 * and the stored set never changes afterwards.
 */
export class MCTSExpansion<S extends SearchState<S>> {
    constructor(
        private statistics: StatisticsStore<S>,
    ) {}

    /**
     * Expands a state by storing its successors. No-op if it was already expanded.
     *
     * @returns The memoized successors of `state` (empty for a terminal state)
     */
    expand(state: S): readonly S[] {
        const existing = this.statistics.getChildren(state);
        if (existing) {
            return existing;
        }

        return this.statistics.setChildren(state, state.successors());
    }
}
