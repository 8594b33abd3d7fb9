import type { SearchState } from '../mcts-state.js';

/**
 * Generic Decision Strategy Interface
 *
 * Any player (MCTS, Random, a scripted opponent in tests) implements this interface.
 * Strategies are game-agnostic: they only see states through the SearchState contract.
 */
export interface DecisionStrategy<S extends SearchState<S>> {
    /**
     * Decide which successor of `state` to move to.
     * Throws InvalidOperationError when `state` is terminal.
     */
    getMove(state: S): S;
}
