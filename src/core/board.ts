import { Action, Board, Cell, Player } from './types';

export const BOARD_SIZE = 3;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

export const WIN_LINES: readonly (readonly Action[])[] = [
  // rows
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  // columns
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  // diagonals
  [0, 4, 8],
  [2, 4, 6],
];

export function toIndex(row: number, column: number): Action {
  return row * BOARD_SIZE + column;
}

export class GridBoard implements Board {
  private readonly values: Cell[];

  constructor(cells?: readonly Cell[]) {
    if (cells && cells.length !== CELL_COUNT) {
      throw new Error(`Expected ${CELL_COUNT} cells, received ${cells.length}`);
    }
    this.values = cells ? [...cells] : Array.from({ length: CELL_COUNT }, (): Cell => 0);
  }

  get cells(): readonly Cell[] {
    return this.values;
  }

  clone(): GridBoard {
    return new GridBoard(this.values);
  }

  get(index: Action): Cell | undefined {
    if (!this.isInside(index)) {
      return undefined;
    }
    return this.values[index];
  }

  set(index: Action, value: Cell): void {
    if (!this.isInside(index)) {
      throw new Error(`Cell ${index} is outside of the board`);
    }
    this.values[index] = value;
  }

  isInside(index: Action): boolean {
    return Number.isInteger(index) && index >= 0 && index < CELL_COUNT;
  }

  isOccupied(index: Action): boolean {
    if (!this.isInside(index)) {
      return true;
    }
    return (this.values[index] ?? 0) !== 0;
  }

  emptyCells(): Action[] {
    const empty: Action[] = [];
    this.values.forEach((cell, index) => {
      if (cell === 0) {
        empty.push(index);
      }
    });
    return empty;
  }

  isFull(): boolean {
    return this.values.every((cell) => cell !== 0);
  }

  count(player: Player): number {
    return this.values.filter((cell) => cell === player).length;
  }

  clear(): void {
    this.values.fill(0);
  }

  findWinningLine(): { player: Player; line: readonly Action[] } | null {
    for (const line of WIN_LINES) {
      const [a, b, c] = line;
      if (a === undefined || b === undefined || c === undefined) {
        continue;
      }
      const first = this.values[a];
      if (first !== undefined && first !== 0 && first === this.values[b] && first === this.values[c]) {
        return { player: first, line };
      }
    }
    return null;
  }
}
