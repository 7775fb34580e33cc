import { Action } from './types';

export class GameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The action is not in the current legal set. */
export class InvalidActionError extends GameError {
  public readonly action: Action;

  constructor(action: Action, reason: string) {
    super(`Invalid action ${action}: ${reason}`);
    this.action = action;
  }
}

/** `step` was called after the game reached a terminal state. */
export class GameOverError extends GameError {
  constructor() {
    super('The game is already over; call reset() before stepping again');
  }
}

/** A persisted Q-table could not be read or did not validate. */
export class PersistenceError extends GameError {
  public readonly filePath: string | null;

  constructor(message: string, filePath: string | null = null, cause?: unknown) {
    super(
      filePath === null ? message : `${message} (${filePath})`,
      cause === undefined ? undefined : { cause },
    );
    this.filePath = filePath;
  }
}
