import type { SearchState } from '../mcts-state.js';
import type { StatisticsView } from '../statistics-store.js';
import { calculateAvgScore } from './mcts-stats-utils.js';

/**
 * Renders the explored part of the state graph below `root`, one line per state.
 * Unvisited successors are skipped. States reachable along several paths are
 * printed under each parent.
 */
export const formatTree = <S extends SearchState<S>>(statistics: StatisticsView<S>, root: S, maxDepth: number = 2): string[] => {
    const lines: string[] = [];

    const visit = (state: S, depth: number, prefix: string): void => {
        const indent = '  '.repeat(depth);
        const visits = statistics.getVisits(state);
        const avgReward = calculateAvgScore(visits, statistics.getTotalReward(state));
        const children = statistics.getChildren(state);
        const childCount = children ? String(children.length) : 'unexpanded';
        lines.push(`${indent}${prefix}${state.key()}: visits=${visits}, avg=${avgReward.toFixed(4)}, children=${childCount}`);

        if (!children || depth >= maxDepth) {
            return;
        }

        children.forEach((child, idx) => {
            if (statistics.getVisits(child) > 0) {
                visit(child, depth + 1, `[${idx}] `);
            }
        });
    };

    visit(root, 0, 'ROOT ');
    return lines;
};

export const printTree = <S extends SearchState<S>>(statistics: StatisticsView<S>, root: S, maxDepth: number = 2): void => {
    for (const line of formatTree(statistics, root, maxDepth)) {
        console.log(line);
    }
};
