import { Policy, PolicyKind } from '../ai/policy';
import { markerOf } from '../core/encoding';
import { InvalidActionError } from '../core/errors';
import { otherPlayer, TicTacToeGame } from '../core/game';
import { Action, Cell, GameStatus, Player, StateKey } from '../core/types';

export type HumanResult = 'win' | 'lose' | 'tie';

export interface PlaySnapshot {
  state: StateKey;
  cells: Cell[];
  humanPlayer: Player;
  humanMarker: 'X' | 'O';
  agent: PolicyKind;
  toMove: Player;
  legalActions: Action[];
  status: GameStatus;
  result: HumanResult | null;
  /** Cells chosen by the agent since the session started, in order. */
  agentMoves: Action[];
}

/**
 * One game between a human seat and an agent that always acts greedily.
 * The agent replies immediately after every human move.
 */
export class PlaySession {
  public readonly humanPlayer: Player;
  private readonly agent: Policy;
  private readonly game: TicTacToeGame;
  private agentMoves: Action[] = [];

  constructor(agent: Policy, humanPlayer: Player, game: TicTacToeGame = new TicTacToeGame()) {
    this.agent = agent;
    this.humanPlayer = humanPlayer;
    this.game = game;
  }

  get agentPlayer(): Player {
    return otherPlayer(this.humanPlayer);
  }

  start(): PlaySnapshot {
    this.game.reset();
    this.agentMoves = [];
    this.replyIfAgentToMove();
    return this.snapshot();
  }

  humanMove(action: Action): PlaySnapshot {
    if (!this.game.isTerminal() && this.game.getCurrentPlayer() !== this.humanPlayer) {
      throw new InvalidActionError(action, 'it is not the human player\'s turn');
    }
    this.game.step(action);
    this.replyIfAgentToMove();
    return this.snapshot();
  }

  snapshot(): PlaySnapshot {
    const state = this.game.getState();
    const status = this.game.getStatus();
    return {
      state,
      cells: [...this.game.getCells()],
      humanPlayer: this.humanPlayer,
      humanMarker: markerOf(this.humanPlayer),
      agent: this.agent.kind,
      toMove: this.game.getCurrentPlayer(),
      legalActions: this.game.isTerminal() ? [] : this.game.legalActions(state),
      status,
      result: this.resultOf(status),
      agentMoves: [...this.agentMoves],
    };
  }

  private replyIfAgentToMove(): void {
    if (this.game.isTerminal() || this.game.getCurrentPlayer() !== this.agentPlayer) {
      return;
    }
    const state = this.game.getState();
    const action = this.agent.selectAction(state, this.game.legalActions(state), false);
    this.game.step(action);
    this.agentMoves.push(action);
  }

  private resultOf(status: GameStatus): HumanResult | null {
    switch (status.kind) {
      case 'won':
        return status.winner === this.humanPlayer ? 'win' : 'lose';
      case 'drawn':
        return 'tie';
      default:
        return null;
    }
  }
}
