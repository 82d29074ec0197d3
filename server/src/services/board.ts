import { Cell, Outcome, PlayerMark } from '../types/game';

/**
 * Board cells are indexed row-major:
 *   0 | 1 | 2
 *   3 | 4 | 5
 *   6 | 7 | 8
 */
export const BOARD_SIZE = 9;

export const WIN_LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export class InvalidMoveError extends Error {
  constructor(index: number) {
    super(`Invalid position (${index})`);
    this.name = 'InvalidMoveError';
  }
}

export function otherMark(mark: PlayerMark): PlayerMark {
  return mark === 'X' ? 'O' : 'X';
}

function completesLine(cells: readonly Cell[], mark: PlayerMark): boolean {
  return WIN_LINES.some(([a, b, c]) => cells[a] === mark && cells[b] === mark && cells[c] === mark);
}

// X is checked before O. Both holding a line cannot happen with alternating play.
export function outcomeOf(cells: readonly Cell[]): Outcome {
  if (completesLine(cells, 'X')) return 'x_wins';
  if (completesLine(cells, 'O')) return 'o_wins';
  if (cells.every((c) => c !== null)) return 'draw';
  return 'ongoing';
}

export function emptyIndices(cells: readonly Cell[]): number[] {
  const out: number[] = [];
  cells.forEach((c, i) => {
    if (c === null) out.push(i);
  });
  return out;
}

/** Renders cells as three rows of `X O _` for debug output. */
export function dumpBoard(cells: readonly Cell[]): string {
  let dump = '\n';
  cells.forEach((c, i) => {
    dump += `${c ?? '_'} `;
    if (i % 3 === 2) dump += '\n';
  });
  return dump;
}

export class Board {
  private readonly cells: Cell[];

  constructor(cells?: readonly Cell[]) {
    if (cells && cells.length !== BOARD_SIZE) {
      throw new Error(`Board needs ${BOARD_SIZE} cells, got ${cells.length}`);
    }
    this.cells = cells ? cells.slice() : Array<Cell>(BOARD_SIZE).fill(null);
  }

  legalMoves(): number[] {
    return emptyIndices(this.cells);
  }

  occupiedBy(mark: PlayerMark): Set<number> {
    const out = new Set<number>();
    this.cells.forEach((c, i) => {
      if (c === mark) out.add(i);
    });
    return out;
  }

  /** Marks `index` for `mark`; throws InvalidMoveError unless the cell is empty. */
  applyMove(index: number, mark: PlayerMark): void {
    if (!Number.isInteger(index) || index < 0 || index >= BOARD_SIZE || this.cells[index] !== null) {
      throw new InvalidMoveError(index);
    }
    this.cells[index] = mark;
  }

  outcome(): Outcome {
    return outcomeOf(this.cells);
  }

  cellAt(index: number): Cell {
    return this.cells[index] ?? null;
  }

  isEmpty(): boolean {
    return this.cells.every((c) => c === null);
  }

  snapshot(): Cell[] {
    return this.cells.slice();
  }
}
