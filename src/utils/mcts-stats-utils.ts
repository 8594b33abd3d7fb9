export function calculateAvgScore(visits: number, totalReward: number): number {
    return visits > 0 ? totalReward / visits : 0;
}

/**
 * Calculates the UCT (Upper Confidence bound applied to Trees) score of a child.
 * UCT = exploitation + exploration = (total_reward / visits) + c * sqrt(ln(parent_visits) / visits)
 *
 * Callers must guarantee parentVisits > 0 and visits > 0; the selection phase
 * checks this before scoring so the result is always finite.
 *
 * @param explorationWeight - c in the formula above; 1 gives the plain UCT bound
 */
export function getUCTScore(parentVisits: number, visits: number, totalReward: number, explorationWeight: number = 1): number {
    const exploitation = totalReward / visits;
    const exploration = Math.sqrt(Math.log(parentVisits) / visits);

    return exploitation + explorationWeight * exploration;
}
