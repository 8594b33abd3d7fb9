import type { SearchState } from '../mcts-state.js';
import type { DecisionStrategy } from '../strategies/decision-strategy.js';
import { InvalidOperationError } from '../errors.js';

export interface GameRecord<S> {
    /** Every state of the game, starting with the initial one */
    history: S[];
    /** Final state; terminal unless the ply limit was hit */
    final: S;
    completed: boolean;
}

/**
 * Plays a game between two strategies, the first one moving from `initial`.
 *
 * Every move is checked against the state's successors, so a strategy returning
 * an illegal state fails loudly instead of corrupting the game.
 *
 * @param maxPlies - Stop early after this many moves (game left incomplete)
 */
export function playGame<S extends SearchState<S>>(
    initial: S,
    strategies: readonly [DecisionStrategy<S>, DecisionStrategy<S>],
    maxPlies: number = Infinity,
): GameRecord<S> {
    const history: S[] = [ initial ];
    let current = initial;
    let ply = 0;

    while (!current.isTerminal() && ply < maxPlies) {
        const next = strategies[ply % 2].getMove(current);
        const nextKey = next.key();

        if (!current.successors().some(successor => successor.key() === nextKey)) {
            throw new InvalidOperationError(`Strategy ${ply % 2} moved from ${current.key()} to non-successor ${nextKey}`);
        }

        history.push(next);
        current = next;
        ply++;
    }

    return { history, final: current, completed: current.isTerminal() };
}
