import { CELL_COUNT } from './board';
import { Cell, Player, StateKey } from './types';

const CELL_CHARS: Record<Cell, string> = { 0: '.', 1: 'X', 2: 'O' };

export const STATE_KEY_PATTERN = /^[.XO]{9}:[XO]$/;

export function markerOf(player: Player): 'X' | 'O' {
  return player === 1 ? 'X' : 'O';
}

export function encodeState(cells: readonly Cell[], toMove: Player): StateKey {
  if (cells.length !== CELL_COUNT) {
    throw new Error(`Cannot encode a board of ${cells.length} cells`);
  }
  return `${cells.map((cell) => CELL_CHARS[cell]).join('')}:${markerOf(toMove)}`;
}

function parseCell(char: string): Cell {
  switch (char) {
    case 'X':
      return 1;
    case 'O':
      return 2;
    default:
      return 0;
  }
}

export function decodeState(state: StateKey): { cells: Cell[]; toMove: Player } {
  if (!STATE_KEY_PATTERN.test(state)) {
    throw new Error(`Malformed state key "${state}"`);
  }
  const cells = Array.from(state.slice(0, CELL_COUNT), parseCell);
  const toMove: Player = state.endsWith('X') ? 1 : 2;
  return { cells, toMove };
}

export function isStateKey(value: string): value is StateKey {
  return STATE_KEY_PATTERN.test(value);
}
