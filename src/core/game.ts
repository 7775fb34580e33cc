import { GridBoard } from './board';
import { decodeState, encodeState } from './encoding';
import { GameOverError, InvalidActionError } from './errors';
import {
  Action,
  Cell,
  GameStatus,
  Outcome,
  Player,
  StateKey,
  StepResult,
} from './types';

const ONGOING: GameStatus = { kind: 'ongoing' };

export function otherPlayer(player: Player): Player {
  return player === 1 ? 2 : 1;
}

export function legalActionsOf(state: StateKey): Action[] {
  const { cells } = decodeState(state);
  const actions: Action[] = [];
  cells.forEach((cell, index) => {
    if (cell === 0) {
      actions.push(index);
    }
  });
  return actions;
}

function statusOf(board: GridBoard): GameStatus {
  const win = board.findWinningLine();
  if (win) {
    return { kind: 'won', winner: win.player, line: win.line };
  }
  if (board.isFull()) {
    return { kind: 'drawn' };
  }
  return ONGOING;
}

export function outcomeOf(status: GameStatus): Outcome | null {
  switch (status.kind) {
    case 'won':
      return status.winner === 1 ? 'player1' : 'player2';
    case 'drawn':
      return 'draw';
    default:
      return null;
  }
}

export class TicTacToeGame {
  private readonly board: GridBoard;
  private toMove: Player;
  private statusValue: GameStatus;
  private moves: number;

  constructor() {
    this.board = new GridBoard();
    this.toMove = 1;
    this.statusValue = ONGOING;
    this.moves = 0;
  }

  /**
   * Restores a position from its state key. The key must respect turn
   * alternation: X has the same number of marks as O (X to move) or one
   * more (O to move).
   */
  static fromState(state: StateKey): TicTacToeGame {
    const { cells, toMove } = decodeState(state);
    const board = new GridBoard(cells);
    const xCount = board.count(1);
    const oCount = board.count(2);
    const expectedToMove: Player | null =
      xCount === oCount ? 1 : xCount === oCount + 1 ? 2 : null;
    if (expectedToMove === null) {
      throw new Error(`State "${state}" breaks turn alternation (X=${xCount}, O=${oCount})`);
    }
    const status = statusOf(board);
    const lastMover = otherPlayer(expectedToMove);
    if (status.kind === 'won' && status.winner !== lastMover) {
      throw new Error(`State "${state}" has a winner who did not make the last move`);
    }
    // A finished game keeps the last mover as the player to move.
    const recordedToMove = status.kind === 'ongoing' ? expectedToMove : lastMover;
    if (toMove !== recordedToMove) {
      throw new Error(`State "${state}" names the wrong player to move`);
    }
    const game = new TicTacToeGame();
    cells.forEach((cell, index) => game.board.set(index, cell));
    game.toMove = toMove;
    game.statusValue = status;
    game.moves = xCount + oCount;
    return game;
  }

  reset(): StateKey {
    this.board.clear();
    this.toMove = 1;
    this.statusValue = ONGOING;
    this.moves = 0;
    return this.getState();
  }

  getState(): StateKey {
    return encodeState(this.board.cells, this.toMove);
  }

  legalActions(state: StateKey = this.getState()): Action[] {
    return legalActionsOf(state);
  }

  step(action: Action): StepResult {
    if (this.isTerminal()) {
      throw new GameOverError();
    }
    if (!this.board.isInside(action)) {
      throw new InvalidActionError(action, 'not a cell index between 0 and 8');
    }
    if (this.board.isOccupied(action)) {
      throw new InvalidActionError(action, 'cell is already occupied');
    }

    const player = this.toMove;
    this.board.set(action, player);
    this.moves += 1;
    this.statusValue = statusOf(this.board);

    const terminal = this.statusValue.kind !== 'ongoing';
    if (!terminal) {
      this.toMove = otherPlayer(player);
    }
    return {
      state: this.getState(),
      reward: this.statusValue.kind === 'won' ? 1 : 0,
      terminal,
      status: this.statusValue,
      player,
    };
  }

  getStatus(): GameStatus {
    return this.statusValue;
  }

  getCurrentPlayer(): Player {
    return this.toMove;
  }

  getCells(): readonly Cell[] {
    return [...this.board.cells];
  }

  getMoveCount(): number {
    return this.moves;
  }

  isTerminal(): boolean {
    return this.statusValue.kind !== 'ongoing';
  }

  outcome(): Outcome | null {
    return outcomeOf(this.statusValue);
  }
}
