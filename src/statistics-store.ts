import type { SearchState } from './mcts-state.js';
import { calculateAvgScore } from './utils/mcts-stats-utils.js';

/**
 * Plain-object view of a store, keyed by state key.
 * Used to compare the statistics of two engines.
 */
export interface StatisticsSnapshot {
    visits: Record<string, number>;
    totalRewards: Record<string, number>;
    children: Record<string, string[]>;
}

/**
 * Visit and reward statistics for every state an engine has touched, plus the
 * memoized successors of every state it has expanded.
 *
 * Reads of unseen states return 0 rather than relying on a defaulting map.
 * Visits are never deleted. Children are removed only when the rollout that
 * memoized them fails before recording a visit.
 *
 * INVARIANTS:
 * - A state has children iff it has been expanded; the first write wins.
 * - Outside a running rollout, every expanded state has been visited.
 * - visits = 0 implies totalReward = 0.
 * - totalReward / visits stays in the reward range [0, 1].
 */
export class StatisticsStore<S extends SearchState<S>> {
    private visits = new Map<string, number>();

    private totalRewards = new Map<string, number>();

    private children = new Map<string, readonly S[]>();

    getVisits(state: S): number {
        return this.visits.get(state.key()) ?? 0;
    }

    getTotalReward(state: S): number {
        return this.totalRewards.get(state.key()) ?? 0;
    }

    getAverageReward(state: S): number {
        return calculateAvgScore(this.getVisits(state), this.getTotalReward(state));
    }

    recordVisit(state: S, reward: number): void {
        const key = state.key();
        this.visits.set(key, (this.visits.get(key) ?? 0) + 1);
        this.totalRewards.set(key, (this.totalRewards.get(key) ?? 0) + reward);
    }

    isExpanded(state: S): boolean {
        return this.children.has(state.key());
    }

    getChildren(state: S): readonly S[] | undefined {
        return this.children.get(state.key());
    }

    /**
     * Memoizes the successors of a state. Returns the stored children, which are
     * the previously stored ones if the state was already expanded.
     */
    setChildren(state: S, children: readonly S[]): readonly S[] {
        const key = state.key();
        const existing = this.children.get(key);
        if (existing) {
            return existing;
        }
        const frozen = Object.freeze([ ...children ]);
        this.children.set(key, frozen);
        return frozen;
    }

    /**
     * Forgets the memoized successors of a state. Only for undoing the expansion
     * of a rollout that threw before its leaf was visited.
     */
    deleteChildren(state: S): void {
        this.children.delete(state.key());
    }

    /** Number of states with at least one recorded visit. */
    get size(): number {
        return this.visits.size;
    }

    get expandedCount(): number {
        return this.children.size;
    }

    snapshot(): StatisticsSnapshot {
        return {
            visits: Object.fromEntries(this.visits),
            totalRewards: Object.fromEntries(this.totalRewards),
            children: Object.fromEntries(
                [ ...this.children ].map(([ key, children ]): [string, string[]] => [ key, children.map(child => child.key()) ]),
            ),
        };
    }
}

/**
 * The reads of a StatisticsStore, for callers outside the engine.
 */
export type StatisticsView<S extends SearchState<S>> = Pick<
    StatisticsStore<S>,
    'getVisits' | 'getTotalReward' | 'getAverageReward' | 'isExpanded' | 'getChildren' | 'size' | 'expandedCount' | 'snapshot'
>;
