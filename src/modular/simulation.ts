import type { SearchState } from '../mcts-state.js';

/**
 * MCTS Simulation Phase Implementation (default policy)
 *
 * Plays uniformly random successors from a leaf until the game ends and turns the
 * terminal reward into a single scalar for backpropagation.
 *
 * REWARD PERSPECTIVE:
 * A terminal state reports its reward for the player about to move there. Each ply
 * hands the move to the other player, so the parity of the number of plies between
 * the leaf and the terminal state decides whether the reward must be complemented.
 * The returned value is the outcome for the player who moved INTO the leaf, which is
 * the perspective backpropagation credits to the leaf itself:
 * - leaf terminal (0 plies): 1 - reward
 * - 1 ply: reward
 * - 2 plies: 1 - reward, and so on
 *
 * The loop has no length bound of its own; the state model must guarantee that
 * random play terminates.
 */
export class MCTSSimulation<S extends SearchState<S>> {
    /**
     * @returns Reward in [0, 1] for the player who moved into `leaf`
     */
    simulate(leaf: S): number {
        let current = leaf;
        let invertReward = true;

        while (!current.isTerminal()) {
            current = current.randomSuccessor();
            invertReward = !invertReward;
        }

        const reward = current.reward();
        return invertReward ? 1 - reward : reward;
    }
}
