import type { SearchState } from '../mcts-state.js';
import { MCTS } from '../modular/mcts.js';
import type { MCTSConfig } from '../modular/mcts-config.js';
import { InvalidOperationError, InvariantViolationError } from '../errors.js';
import type { DecisionStrategy } from './decision-strategy.js';
import { RandomDecisionStrategy } from './random-decision-strategy.js';

/**
 * MCTS Decision Strategy
 *
 * Runs `config.iterations` rollouts from the current state on every turn, then plays
 * the engine's choice. The engine lives as long as the strategy, so statistics
 * gathered on earlier turns keep paying off on later ones.
 *
 * Falls back to RandomDecisionStrategy when the engine reports a broken invariant.
 */
export class MCTSDecisionStrategy<S extends SearchState<S>> implements DecisionStrategy<S> {
    public readonly mcts: MCTS<S>;

    private randomStrategy = new RandomDecisionStrategy<S>();

    /**
     * @param engine an engine to search with, or the configuration of a new one
     */
    constructor(engine: MCTS<S> | Partial<MCTSConfig> = {}) {
        this.mcts = engine instanceof MCTS ? engine : new MCTS<S>(engine);
    }

    getMove(state: S): S {
        if (state.isTerminal()) {
            throw new InvalidOperationError(`getMove called on terminal state ${state.key()}`);
        }

        try {
            return this.mcts.search(state);
        } catch (error) {
            if (!(error instanceof InvariantViolationError)) {
                throw error;
            }
            console.warn(`[MCTSDecisionStrategy] MCTS threw error (${error.message}), falling back to random strategy`);
            return this.randomStrategy.getMove(state);
        }
    }
}
