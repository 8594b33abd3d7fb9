import type { SearchState } from '../../mcts-state.js';
import { InvalidOperationError } from '../../errors.js';
import { type RandomSource, pickRandom } from '../../utils/random.js';
import { type Cell, EMPTY, type Piece, isCell, opponent } from './piece.js';

export const BOARD_SIZE = 3;

export const LOSS_REWARD = 0;
export const TIE_REWARD = 0.5;

/*
 * Cells are indexed by row:
 * 0 1 2
 * 3 4 5
 * 6 7 8
 */
const WINNING_LINES: readonly (readonly [number, number, number])[] = [
    [ 0, 1, 2 ], [ 3, 4, 5 ], [ 6, 7, 8 ],
    [ 0, 3, 6 ], [ 1, 4, 7 ], [ 2, 5, 8 ],
    [ 0, 4, 8 ], [ 2, 4, 6 ],
];

export function rowColToIndex(row: number, col: number): number {
    return row * BOARD_SIZE + col;
}

function findWinner(cells: readonly Cell[]): Piece | undefined {
    for (const [ a, b, c ] of WINNING_LINES) {
        const first = cells[a];
        if (first !== EMPTY && first === cells[b] && first === cells[c]) {
            return first;
        }
    }
    return undefined;
}

/**
 * Immutable tic-tac-toe position, X to move first.
 *
 * The key is the nine cells read row by row, e.g. `XX_OO____`. Whose turn it is
 * follows from the piece counts, so the cells alone identify the state.
 * Successors are produced in ascending cell order.
 */
export class TicTacToeBoard implements SearchState<TicTacToeBoard> {
    readonly winner: Piece | undefined;

    readonly terminal: boolean;

    private constructor(
        readonly cells: readonly Cell[],
        readonly turn: Piece,
        private random: RandomSource,
    ) {
        this.winner = findWinner(cells);
        this.terminal = this.winner !== undefined || !cells.includes(EMPTY);
    }

    static empty(random: RandomSource = Math.random): TicTacToeBoard {
        return new TicTacToeBoard(Array<Cell>(BOARD_SIZE * BOARD_SIZE).fill(EMPTY), 'X', random);
    }

    /**
     * Builds a board from its key, e.g. `X_O______`. The player to move is X when
     * both players have placed the same number of pieces, O when X has one more.
     */
    static fromString(layout: string, random: RandomSource = Math.random): TicTacToeBoard {
        const chars = [ ...layout ];
        if (chars.length !== BOARD_SIZE * BOARD_SIZE) {
            throw new InvalidOperationError(`Board layout must have ${BOARD_SIZE * BOARD_SIZE} cells, got "${layout}"`);
        }

        const cells: Cell[] = [];
        for (const char of chars) {
            if (!isCell(char)) {
                throw new InvalidOperationError(`Unknown cell "${char}" in board layout "${layout}"`);
            }
            cells.push(char);
        }

        const xCount = cells.filter(cell => cell === 'X').length;
        const oCount = cells.filter(cell => cell === 'O').length;
        if (xCount !== oCount && xCount !== oCount + 1) {
            throw new InvalidOperationError(`Board layout "${layout}" has ${xCount} X and ${oCount} O pieces`);
        }

        return new TicTacToeBoard(cells, xCount === oCount ? 'X' : 'O', random);
    }

    makeMove(index: number): TicTacToeBoard {
        if (this.terminal) {
            throw new InvalidOperationError(`makeMove called on finished board ${this.key()}`);
        }
        if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
            throw new InvalidOperationError(`Cell index ${index} is off the board`);
        }
        if (this.cells[index] !== EMPTY) {
            throw new InvalidOperationError(`Cell ${index} is already taken on board ${this.key()}`);
        }

        const cells = [ ...this.cells ];
        cells[index] = this.turn;
        return new TicTacToeBoard(cells, opponent(this.turn), this.random);
    }

    emptyCells(): number[] {
        const indices: number[] = [];
        this.cells.forEach((cell, index) => {
            if (cell === EMPTY) {
                indices.push(index);
            }
        });
        return indices;
    }

    successors(): TicTacToeBoard[] {
        if (this.terminal) {
            return [];
        }
        return this.emptyCells().map(index => this.makeMove(index));
    }

    randomSuccessor(): TicTacToeBoard {
        if (this.terminal) {
            throw new InvalidOperationError(`randomSuccessor called on finished board ${this.key()}`);
        }
        return this.makeMove(pickRandom(this.emptyCells(), this.random));
    }

    isTerminal(): boolean {
        return this.terminal;
    }

    reward(): number {
        if (!this.terminal) {
            throw new InvalidOperationError(`reward called on nonterminal board ${this.key()}`);
        }

        if (this.winner === undefined) {
            return TIE_REWARD;
        }

        if (this.winner === this.turn) {
            // The player to move has already won - no legal game reaches this
            throw new InvalidOperationError(`reward called on unreachable board ${this.key()}`);
        }

        // The opponent has just won
        return LOSS_REWARD;
    }

    key(): string {
        return this.cells.join('');
    }

    toString(): string {
        const header = '  ' + Array.from({ length: BOARD_SIZE }, (_, col) => String(col + 1)).join(' ');
        const rows = Array.from({ length: BOARD_SIZE }, (_, row) => {
            const cells = this.cells.slice(rowColToIndex(row, 0), rowColToIndex(row + 1, 0));
            return `${row + 1} ${cells.join(' ')}`;
        });
        return [ header, ...rows ].join('\n');
    }
}
