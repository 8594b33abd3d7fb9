import type { SearchState } from '../../src/mcts-state.js';
import type { StatisticsStore } from '../../src/statistics-store.js';
import type { RandomSource } from '../../src/utils/random.js';
import { InvalidOperationError } from '../../src/errors.js';
import { pickRandom } from '../../src/utils/random.js';

/**
 * Explicit game graph for tests: each id maps to its successor ids, or to the
 * terminal reward (a number, or a function computing it).
 */
export type GameGraph = Record<string, readonly string[] | number | (() => number)>;

/**
 * Owns a GameGraph and hands out states over it.
 * Random choices go through `random`, which defaults to always picking the first successor.
 */
export class GraphGame {
    readonly successorCalls = new Map<string, number>();

    constructor(
        private graph: GameGraph,
        readonly random: RandomSource = () => 0,
    ) {}

    state(id: string): GraphState {
        if (!(id in this.graph)) {
            throw new Error(`Unknown state ${id}`);
        }
        return new GraphState(this, id);
    }

    node(id: string): readonly string[] | number | (() => number) {
        return this.graph[id];
    }

    recordSuccessorCall(id: string): void {
        this.successorCalls.set(id, (this.successorCalls.get(id) ?? 0) + 1);
    }
}

export class GraphState implements SearchState<GraphState> {
    constructor(
        private game: GraphGame,
        readonly id: string,
    ) {}

    successors(): GraphState[] {
        this.game.recordSuccessorCall(this.id);
        return this.childIds().map(id => this.game.state(id));
    }

    randomSuccessor(): GraphState {
        const ids = this.childIds();
        if (ids.length === 0) {
            throw new InvalidOperationError(`randomSuccessor called on terminal state ${this.id}`);
        }
        return this.game.state(pickRandom(ids, this.game.random));
    }

    isTerminal(): boolean {
        return !Array.isArray(this.game.node(this.id));
    }

    reward(): number {
        const node = this.game.node(this.id);
        if (typeof node === 'number') {
            return node;
        }
        if (typeof node === 'function') {
            return node();
        }
        throw new InvalidOperationError(`reward called on nonterminal state ${this.id}`);
    }

    key(): string {
        return this.id;
    }

    private childIds(): readonly string[] {
        const node = this.game.node(this.id);
        return typeof node === 'number' || typeof node === 'function' ? [] : node;
    }
}

/**
 * Records one visit per reward, so the state ends with visits = rewards.length
 * and totalReward = sum(rewards).
 */
export function seedVisits<S extends SearchState<S>>(statistics: StatisticsStore<S>, state: S, rewards: readonly number[]): void {
    for (const reward of rewards) {
        statistics.recordVisit(state, reward);
    }
}

export const keysOf = (states: readonly { key(): string }[]): string[] => states.map(state => state.key());
