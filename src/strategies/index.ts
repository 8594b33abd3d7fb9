export * from './decision-strategy.js';
export * from './random-decision-strategy.js';
export * from './mcts-decision-strategy.js';
