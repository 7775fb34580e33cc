export type Player = 1 | 2;

export type Cell = 0 | Player;

/** Row-major cell index, 0 (top left) to 8 (bottom right). */
export type Action = number;

/** Canonical board + player-to-move encoding, see `encodeState`. */
export type StateKey = string;

export type Outcome = 'player1' | 'player2' | 'draw';

export type GameStatus =
  | { kind: 'ongoing' }
  | { kind: 'won'; winner: Player; line: readonly Action[] }
  | { kind: 'drawn' };

export interface StepResult {
  state: StateKey;
  /** Reward for the player who moved: 1 for a win, 0 otherwise. */
  reward: number;
  terminal: boolean;
  status: GameStatus;
  player: Player;
}

export interface Transition {
  state: StateKey;
  action: Action;
  reward: number;
  nextState: StateKey;
  nextLegalActions: readonly Action[];
  terminal: boolean;
}

export interface Board {
  readonly cells: readonly Cell[];
  clone(): Board;
  get(index: Action): Cell | undefined;
  set(index: Action, value: Cell): void;
  isInside(index: Action): boolean;
  isOccupied(index: Action): boolean;
  emptyCells(): Action[];
  isFull(): boolean;
  count(player: Player): number;
  findWinningLine(): { player: Player; line: readonly Action[] } | null;
}
