import type { SearchState } from '../mcts-state.js';
import type { StatisticsStore } from '../statistics-store.js';
import { InvalidOperationError } from '../errors.js';

export interface RankedSuccessor<S> {
    state: S;
    /** Average reward, or -Infinity when the successor was never visited */
    score: number;
    visits: number;
}

/**
 * Picks the move to play once search resources are spent.
 *
 * Pure exploitation: successors are compared by average reward only, with no
 * exploration bonus. Successors that were never visited score -Infinity, so any
 * visited alternative beats them. Ties go to the earliest successor in memoized
 * order, which also settles the case where no successor has been visited.
 */
export class MCTSMoveSelector<S extends SearchState<S>> {
    constructor(
        private statistics: StatisticsStore<S>,
    ) {}

    choose(root: S): S {
        if (root.isTerminal()) {
            throw new InvalidOperationError(`choose called on terminal state ${root.key()}`);
        }

        const children = this.statistics.getChildren(root);
        if (!children || children.length === 0) {
            // No statistics yet - degrade to a random move
            return root.randomSuccessor();
        }

        let bestChild = children[0];
        let bestScore = this.score(bestChild);

        for (const child of children) {
            const score = this.score(child);
            if (score > bestScore) {
                bestChild = child;
                bestScore = score;
            }
        }

        return bestChild;
    }

    /**
     * Every memoized successor of `root` with its score, best first.
     * The sort is stable, so equal scores keep memoized order.
     */
    rank(root: S): RankedSuccessor<S>[] {
        const children = this.statistics.getChildren(root) ?? [];

        return children
            .map(state => ({ state, score: this.score(state), visits: this.statistics.getVisits(state) }))
            .sort((a, b) => compareScores(b.score, a.score));
    }

    private score(state: S): number {
        if (this.statistics.getVisits(state) === 0) {
            return -Infinity;
        }
        return this.statistics.getAverageReward(state);
    }
}

// -Infinity - -Infinity is NaN, which would break the comparator
function compareScores(a: number, b: number): number {
    if (a === b) {
        return 0;
    }
    return a > b ? 1 : -1;
}
