import { describe, expect, it } from 'vitest';

import { GridBoard, WIN_LINES, toIndex } from '../src/core/board';
import { decodeState, encodeState } from '../src/core/encoding';
import { GameOverError, InvalidActionError } from '../src/core/errors';
import { TicTacToeGame } from '../src/core/game';
import { Action } from '../src/core/types';

const DRAW_SEQUENCE: Action[] = [0, 1, 2, 4, 3, 6, 7, 5, 8];

function playSequence(actions: readonly Action[]): TicTacToeGame {
  const game = new TicTacToeGame();
  game.reset();
  for (const action of actions) {
    game.step(action);
  }
  return game;
}

function containsLine(cells: readonly Action[]): boolean {
  return WIN_LINES.some((line) => line.every((index) => cells.includes(index)));
}

describe('GridBoard', () => {
  it('maps rows and columns to row-major indices', () => {
    expect(toIndex(0, 0)).toBe(0);
    expect(toIndex(1, 2)).toBe(5);
    expect(toIndex(2, 1)).toBe(7);
  });

  it('reports cells outside the grid as occupied', () => {
    const board = new GridBoard();
    expect(board.isOccupied(-1)).toBe(true);
    expect(board.isOccupied(9)).toBe(true);
    expect(board.isOccupied(4)).toBe(false);
    expect(board.get(9)).toBeUndefined();
  });

  it('finds no winner on a full drawn board', () => {
    const board = new GridBoard([1, 2, 1, 1, 2, 2, 2, 1, 1]);
    expect(board.isFull()).toBe(true);
    expect(board.findWinningLine()).toBeNull();
  });
});

describe('State encoding', () => {
  it('encodes the empty board with X to move', () => {
    expect(encodeState([0, 0, 0, 0, 0, 0, 0, 0, 0], 1)).toBe('.........:X');
  });

  it('round-trips through decodeState', () => {
    const key = encodeState([1, 0, 2, 0, 1, 0, 0, 0, 2], 1);
    expect(key).toBe('X.O.X...O:X');
    expect(decodeState(key)).toEqual({ cells: [1, 0, 2, 0, 1, 0, 0, 0, 2], toMove: 1 });
  });

  it('ignores move order', () => {
    const first = playSequence([0, 4, 8]);
    const second = playSequence([8, 4, 0]);
    expect(first.getState()).toBe('X...O...X:O');
    expect(second.getState()).toBe(first.getState());
  });

  it('distinguishes the player to move', () => {
    const cells = [1, 0, 0, 0, 0, 0, 0, 0, 0] as const;
    expect(encodeState(cells, 1)).not.toBe(encodeState(cells, 2));
  });

  it('rejects malformed keys', () => {
    expect(() => decodeState('XO')).toThrow(/Malformed state key/);
    expect(() => decodeState('.........:Z')).toThrow(/Malformed state key/);
  });
});

describe('TicTacToeGame', () => {
  it('starts empty with player one to move', () => {
    const game = new TicTacToeGame();
    expect(game.reset()).toBe('.........:X');
    expect(game.getCurrentPlayer()).toBe(1);
    expect(game.legalActions()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('shrinks the legal set by exactly one per move and keeps it equal to the empty cells', () => {
    const game = new TicTacToeGame();
    let state = game.reset();
    for (const action of DRAW_SEQUENCE) {
      const before = game.legalActions(state);
      const result = game.step(action);
      const after = game.legalActions(result.state);
      expect(after).toHaveLength(before.length - 1);
      expect(after).toEqual(before.filter((candidate) => candidate !== action));
      const empty = game
        .getCells()
        .map((cell, index) => (cell === 0 ? index : -1))
        .filter((index) => index >= 0);
      expect(after).toEqual(empty);
      state = result.state;
    }
    expect(game.legalActions()).toEqual([]);
  });

  it('alternates players and rewards nothing before the end', () => {
    const game = new TicTacToeGame();
    game.reset();
    const results = DRAW_SEQUENCE.map((action) => game.step(action));
    expect(results.map((result) => result.player)).toEqual([1, 2, 1, 2, 1, 2, 1, 2, 1]);
    expect(results.slice(0, -1).every((result) => result.reward === 0 && !result.terminal)).toBe(true);
  });

  it('detects a draw on a full board without a line', () => {
    const game = playSequence(DRAW_SEQUENCE);
    expect(game.getStatus()).toEqual({ kind: 'drawn' });
    expect(game.outcome()).toBe('draw');
    expect(game.getState()).toBe('XOXXOOOXX:X');
  });

  it.each(WIN_LINES.map((line) => [line.join('-'), line] as const))(
    'awards player one the line %s',
    (_label, line) => {
      const game = new TicTacToeGame();
      game.reset();
      const fillers = [0, 1, 2, 3, 4, 5, 6, 7, 8].filter((index) => !line.includes(index));
      const [a, b, c] = line;
      const [o1, o2] = fillers;
      if (a === undefined || b === undefined || c === undefined || o1 === undefined || o2 === undefined) {
        throw new Error('line setup failed');
      }
      game.step(a);
      game.step(o1);
      game.step(b);
      game.step(o2);
      const result = game.step(c);
      expect(result.terminal).toBe(true);
      expect(result.reward).toBe(1);
      expect(result.player).toBe(1);
      expect(result.status).toEqual({ kind: 'won', winner: 1, line });
      expect(game.outcome()).toBe('player1');
    },
  );

  it.each(WIN_LINES.map((line) => [line.join('-'), line] as const))(
    'awards player two the line %s',
    (_label, line) => {
      const others = [0, 1, 2, 3, 4, 5, 6, 7, 8].filter((index) => !line.includes(index));
      let xCells: Action[] | null = null;
      for (let i = 0; i < others.length && !xCells; i += 1) {
        for (let j = i + 1; j < others.length && !xCells; j += 1) {
          for (let k = j + 1; k < others.length && !xCells; k += 1) {
            const candidate = [others[i], others[j], others[k]].filter(
              (value): value is Action => value !== undefined,
            );
            if (!containsLine(candidate)) {
              xCells = candidate;
            }
          }
        }
      }
      if (!xCells) {
        throw new Error('no filler found');
      }
      const game = new TicTacToeGame();
      game.reset();
      let result = game.step(xCells[0] ?? -1);
      for (let move = 0; move < 3; move += 1) {
        result = game.step(line[move] ?? -1);
        if (move < 2) {
          result = game.step(xCells[move + 1] ?? -1);
          expect(result.terminal).toBe(false);
        }
      }
      expect(result.player).toBe(2);
      expect(result.reward).toBe(1);
      expect(result.status).toEqual({ kind: 'won', winner: 2, line });
      expect(game.outcome()).toBe('player2');
    },
  );

  it('keeps the winning mover as the recorded player on a terminal state', () => {
    const game = playSequence([3, 0, 4, 1, 8, 2]);
    expect(game.getState()).toBe('OOOXX...X:O');
    expect(game.getCurrentPlayer()).toBe(2);
  });

  it('rejects an occupied cell and leaves the board unchanged', () => {
    const game = playSequence([4]);
    const before = game.getState();
    expect(() => game.step(4)).toThrow(InvalidActionError);
    expect(game.getState()).toBe(before);
    expect(game.getCurrentPlayer()).toBe(2);
    expect(game.getMoveCount()).toBe(1);
  });

  it.each([-1, 9, 1.5, Number.NaN])('rejects the out-of-range action %s', (action) => {
    const game = new TicTacToeGame();
    game.reset();
    expect(() => game.step(action)).toThrow(InvalidActionError);
    expect(game.getState()).toBe('.........:X');
  });

  it('refuses to step after the game is over', () => {
    const game = playSequence([0, 3, 1, 4, 2]);
    expect(game.isTerminal()).toBe(true);
    expect(() => game.step(5)).toThrow(GameOverError);
  });

  it('reset clears a finished game', () => {
    const game = playSequence([0, 3, 1, 4, 2]);
    expect(game.reset()).toBe('.........:X');
    expect(game.isTerminal()).toBe(false);
    expect(game.getMoveCount()).toBe(0);
  });

  it('answers legal actions for any state key', () => {
    const game = new TicTacToeGame();
    expect(game.legalActions('XO.X.O..X:O')).toEqual([2, 4, 6, 7]);
  });
});

describe('TicTacToeGame.fromState', () => {
  it('resumes a position and finishes it', () => {
    const game = TicTacToeGame.fromState('XX.OO....:X');
    expect(game.getCurrentPlayer()).toBe(1);
    expect(game.getMoveCount()).toBe(4);
    expect(game.legalActions()).toEqual([2, 5, 6, 7, 8]);
    const result = game.step(2);
    expect(result.status).toEqual({ kind: 'won', winner: 1, line: [0, 1, 2] });
  });

  it('restores a finished game as terminal', () => {
    const game = TicTacToeGame.fromState('XOXXOOOXX:X');
    expect(game.getStatus()).toEqual({ kind: 'drawn' });
    expect(() => game.step(0)).toThrow(GameOverError);
  });

  it('rejects positions that break turn alternation', () => {
    expect(() => TicTacToeGame.fromState('XXX......:O')).toThrow(/turn alternation/);
    expect(() => TicTacToeGame.fromState('O........:X')).toThrow(/turn alternation/);
  });

  it('rejects the wrong player to move', () => {
    expect(() => TicTacToeGame.fromState('.........:O')).toThrow(/wrong player/);
  });
});
