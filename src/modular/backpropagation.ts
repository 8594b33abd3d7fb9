import type { SearchState } from '../mcts-state.js';
import type { StatisticsStore } from '../statistics-store.js';

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Takes the result of a simulation and propagates it back along the path selection
 * produced, from the leaf up to the root.
 *
 * NEGAMAX PRINCIPLE:
 * Turns strictly alternate, so a reward that is good for the player who moved into
 * a state is bad, by the same margin, for the player who moved into its parent.
 * The reward is complemented (1 - reward) at every step up the path.
 *
 * STATISTICS UPDATED:
 * - visits: Incremented for each state on the path
 * - totalReward: Accumulated reward from the perspective of the player who moved into the state
 */
export class MCTSBackpropagation<S extends SearchState<S>> {
    constructor(
        private statistics: StatisticsStore<S>,
    ) {}

    /**
     * @param path - States from root to leaf, as returned by selection
     * @param reward - Simulation result for the leaf (0.0 loss, 0.5 draw, 1.0 win)
     */
    backpropagate(path: readonly S[], reward: number): void {
        let currentReward = reward;

        for (let i = path.length - 1; i >= 0; i--) {
            this.statistics.recordVisit(path[i], currentReward);
            currentReward = 1 - currentReward;
        }
    }
}
