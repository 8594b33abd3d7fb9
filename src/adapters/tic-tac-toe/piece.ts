export type Piece = 'X' | 'O';

export const EMPTY = '_';

export type Cell = Piece | typeof EMPTY;

export function opponent(piece: Piece): Piece {
    return piece === 'X' ? 'O' : 'X';
}

export function isCell(value: string): value is Cell {
    return value === 'X' || value === 'O' || value === EMPTY;
}
