import type { SearchState } from '../mcts-state.js';
import type { DecisionStrategy } from './decision-strategy.js';

/**
 * Random Decision Strategy
 *
 * Moves to a random successor using the state model's own sampling.
 *
 * Used for:
 * - Baseline comparison (MCTS vs Random)
 * - Fallback behavior when MCTS fails
 * - Testing
 */
export class RandomDecisionStrategy<S extends SearchState<S>> implements DecisionStrategy<S> {
    getMove(state: S): S {
        return state.randomSuccessor();
    }
}
