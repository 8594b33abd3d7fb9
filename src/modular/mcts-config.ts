import { InvalidOperationError } from '../errors.js';

export interface MCTSConfig {
    /** Rollouts performed by `search` and by the MCTS decision strategy per move */
    iterations: number;
    /** Weight of the exploration term in the UCT score */
    explorationWeight: number;
}

export const DEFAULT_MCTS_CONFIG: MCTSConfig = {
    iterations: 200,
    explorationWeight: 1,
};

export function resolveMCTSConfig(overrides: Partial<MCTSConfig> = {}): MCTSConfig {
    const config: MCTSConfig = { ...DEFAULT_MCTS_CONFIG, ...overrides };

    if (!Number.isInteger(config.iterations) || config.iterations < 0) {
        throw new InvalidOperationError(`iterations must be a non-negative integer, got ${config.iterations}`);
    }

    if (!Number.isFinite(config.explorationWeight) || config.explorationWeight < 0) {
        throw new InvalidOperationError(`explorationWeight must be a finite non-negative number, got ${config.explorationWeight}`);
    }

    return config;
}
