/*
 * Main entry point for the mcts-engine package
 * Re-exports all public APIs
 */

export * from './mcts-state.js';
export * from './errors.js';
export * from './statistics-store.js';
export * from './modular/index.js';
export * from './strategies/index.js';
export * from './adapters/tic-tac-toe/index.js';
export { type RandomSource, pickRandom } from './utils/random.js';
export { calculateAvgScore, getUCTScore } from './utils/mcts-stats-utils.js';
export { formatTree, printTree } from './utils/tree-debug.js';
export { playGame, type GameRecord } from './utils/game-runner.js';
