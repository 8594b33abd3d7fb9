export { TicTacToeBoard, BOARD_SIZE, LOSS_REWARD, TIE_REWARD, rowColToIndex } from './board.js';
export * from './piece.js';
