import type { SearchState } from '../mcts-state.js';
import { StatisticsStore, type StatisticsView } from '../statistics-store.js';
import { InvalidOperationError } from '../errors.js';
import { printTree } from '../utils/tree-debug.js';
import { MCTSBackpropagation } from './backpropagation.js';
import { MCTSSimulation } from './simulation.js';
import { MCTSExpansion } from './expansion.js';
import { MCTSSelection } from './selection.js';
import { MCTSMoveSelector, type RankedSuccessor } from './move-selector.js';
import { type MCTSConfig, resolveMCTSConfig } from './mcts-config.js';

/**
 * Monte Carlo Tree Search engine over any SearchState.
 *
 * One instance owns one StatisticsStore for its whole lifetime. Every `rollout`
 * adds to the same store, so searching from a later position of the same game
 * reuses whatever was learned about it earlier.
 *
 * The engine is synchronous and never checks a clock: callers decide how many
 * rollouts to run (or stop on a deadline between calls) and then call `choose`.
 */
export class MCTS<S extends SearchState<S>> {
    public readonly config: MCTSConfig;

    private store = new StatisticsStore<S>();

    private selection: MCTSSelection<S>;

    private expansion: MCTSExpansion<S>;

    private simulation: MCTSSimulation<S>;

    private backpropagation: MCTSBackpropagation<S>;

    private moveSelector: MCTSMoveSelector<S>;

    constructor(config: Partial<MCTSConfig> = {}) {
        this.config = resolveMCTSConfig(config);

        this.selection = new MCTSSelection(this.store, this.config.explorationWeight);
        this.expansion = new MCTSExpansion(this.store);
        this.simulation = new MCTSSimulation<S>();
        this.backpropagation = new MCTSBackpropagation(this.store);
        this.moveSelector = new MCTSMoveSelector(this.store);
    }

    /** Read-only access to the statistics gathered so far. */
    get statistics(): StatisticsView<S> {
        return this.store;
    }

    /**
     * Runs one search increment from `root`.
     *
     * A terminal root is its own leaf: it is memoized with no successors, scored
     * directly by simulation and still counted as visited.
     *
     * If simulation throws, an expansion made by this call is undone before the
     * error propagates, so the leaf is still a frontier for the next rollout.
     */
    rollout(root: S): void {
        // SELECTION: path from root to the first frontier state
        const path = this.selection.select(root);
        const leaf = path[path.length - 1];

        // EXPANSION: memoize the leaf's successors
        const wasExpanded = this.store.isExpanded(leaf);
        this.expansion.expand(leaf);

        // SIMULATION: random playout from the leaf
        let reward: number;
        try {
            reward = this.simulation.simulate(leaf);
        } catch (error) {
            if (!wasExpanded) {
                this.store.deleteChildren(leaf);
            }
            throw error;
        }

        // BACKPROPAGATION: alternate the reward up the path
        this.backpropagation.backpropagate(path, reward);
    }

    /**
     * Best successor of `root` by average reward.
     * Throws InvalidOperationError if `root` is terminal.
     */
    choose(root: S): S {
        return this.moveSelector.choose(root);
    }

    /**
     * Runs `iterations` rollouts from `root`, then chooses a move.
     */
    search(root: S, iterations: number = this.config.iterations): S {
        if (!Number.isInteger(iterations) || iterations < 0) {
            throw new InvalidOperationError(`iterations must be a non-negative integer, got ${iterations}`);
        }
        if (root.isTerminal()) {
            throw new InvalidOperationError(`search called on terminal state ${root.key()}`);
        }

        for (let i = 0; i < iterations; i++) {
            this.rollout(root);
        }

        if (process.env.LOG_MCTS_SCORES === 'true') {
            const actions = this.moveSelector.rank(root);
            console.log(`[MCTS] ${actions.length} successors evaluated after ${iterations} rollouts:`);
            actions.slice(0, 5).forEach((a, i) => {
                console.log(`  ${i + 1}. ${a.state.key()} | score=${a.score.toFixed(4)} | visits=${a.visits}`);
            });
        }

        return this.choose(root);
    }

    /**
     * Every memoized successor of `root` with its average reward and visits, best first.
     */
    getActions(root: S): RankedSuccessor<S>[] {
        if (process.env.DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(this.statistics, root);
        }

        return this.moveSelector.rank(root);
    }

    getVisits(state: S): number {
        return this.store.getVisits(state);
    }

    getTotalReward(state: S): number {
        return this.store.getTotalReward(state);
    }
}
