import type { SearchState } from '../mcts-state.js';
import type { StatisticsStore } from '../statistics-store.js';
import { InvariantViolationError } from '../errors.js';
import { getUCTScore } from '../utils/mcts-stats-utils.js';

/**
 * MCTS Selection Phase Implementation (tree policy)
 *
 * Walks from the root through the already-expanded region of the state graph and
 * stops at the first frontier, which becomes the leaf handed to expansion and
 * simulation.
 *
 * PATH CONSTRUCTION PER LEVEL:
 * 1. APPEND: The current state joins the path
 * 2. FRONTIER CHECK: Stop if the state is unexpanded or has no successors (terminal)
 * 3. UNEXPANDED CHILD: If some successor was never expanded, append the first one
 *    in memoized successor order and stop; that successor is the new leaf
 * 4. DESCEND: Every successor is expanded, so move to the successor with the
 *    highest UCT score and repeat
 *
 * TIE-BREAKING:
 * Both the unexpanded-successor pick and the UCT maximum prefer the earliest
 * successor in the order the state model returned them, so the path is fully
 * reproducible for a given store.
 */
export class MCTSSelection<S extends SearchState<S>> {
    constructor(
        private statistics: StatisticsStore<S>,
        private explorationWeight: number = 1,
    ) {}

    /**
     * Builds the path from root to the next leaf to expand.
     *
     * @returns Path starting at `root`; the last element is the leaf
     */
    select(root: S): S[] {
        const path: S[] = [];
        let current = root;

        while (true) {
            path.push(current);

            const children = this.statistics.getChildren(current);
            if (!children || children.length === 0) {
                // Unexpanded or terminal
                return path;
            }

            const unexpanded = children.find(child => !this.statistics.isExpanded(child));
            if (unexpanded) {
                path.push(unexpanded);
                return path;
            }

            current = this.uctSelect(current);
        }
    }

    /**
     * Selects the successor with the highest UCT score, balancing exploitation
     * (high average reward) with exploration (low visit count).
     *
     * PRECONDITION:
     * - `state` is expanded, has at least one successor and has been visited
     * - every successor is expanded and has been visited
     *
     * Violations throw InvariantViolationError instead of scoring log(0) or x/0.
     */
    uctSelect(state: S): S {
        const children = this.statistics.getChildren(state);
        if (!children) {
            throw new InvariantViolationError(`UCT selection on unexpanded state ${state.key()}`);
        }
        if (children.length === 0) {
            throw new InvariantViolationError(`UCT selection on state ${state.key()} with no successors`);
        }

        const parentVisits = this.statistics.getVisits(state);
        if (parentVisits <= 0) {
            throw new InvariantViolationError(`UCT selection on unvisited state ${state.key()}`);
        }

        let bestChild = children[0];
        let bestScore = this.scoreChild(state, parentVisits, bestChild);

        for (const child of children) {
            const score = this.scoreChild(state, parentVisits, child);
            // Strict comparison keeps the earliest successor on ties
            if (score > bestScore) {
                bestChild = child;
                bestScore = score;
            }
        }

        return bestChild;
    }

    private scoreChild(parent: S, parentVisits: number, child: S): number {
        if (!this.statistics.isExpanded(child)) {
            throw new InvariantViolationError(`UCT selection reached unexpanded successor ${child.key()} of ${parent.key()}`);
        }

        const visits = this.statistics.getVisits(child);
        if (visits <= 0) {
            throw new InvariantViolationError(`UCT selection reached unvisited successor ${child.key()} of ${parent.key()}`);
        }

        return getUCTScore(parentVisits, visits, this.statistics.getTotalReward(child), this.explorationWeight);
    }
}
