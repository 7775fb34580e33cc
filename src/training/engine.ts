import { AnyPolicy, QLearningPolicy, RandomPolicy } from '../ai/policy';
import { otherPlayer, TicTacToeGame } from '../core/game';
import { createSeededRandom, RandomSource } from '../core/random';
import { Action, Outcome, Player, StateKey, StepResult } from '../core/types';
import {
  DEFAULT_REWARDS,
  emptyOutcomeCounts,
  emptyTally,
  OutcomeCounts,
  recordOutcome,
  RewardScheme,
  SeatRates,
  SeatTally,
  toRates,
} from './common';

export type Seats = Record<Player, AnyPolicy>;

export interface EpisodeOptions {
  training: boolean;
  rewards?: RewardScheme;
}

export interface SeatEvaluation {
  seat: Player;
  tally: SeatTally;
  rates: SeatRates;
}

export interface TrainingCheckpoint {
  episode: number;
  evaluations: SeatEvaluation[];
  selfPlay: Outcome | null;
}

export interface TrainingOptions {
  episodes: number;
  evaluationInterval: number;
  evaluationEpisodes: number;
  rewards?: RewardScheme;
  /**
   * Seeds the Random opponent afresh at every checkpoint, so successive
   * checkpoints face the same opponent moves. Drawn once per run when unset.
   */
  evaluationSeed?: number;
  onCheckpoint?: (checkpoint: TrainingCheckpoint) => void;
}

export interface TrainingRunResult {
  episodes: number;
  outcomes: OutcomeCounts;
  checkpoints: TrainingCheckpoint[];
}

interface PendingMove {
  state: StateKey;
  action: Action;
}

function learnerAt(seats: Seats, seat: Player, training: boolean): QLearningPolicy | null {
  const policy = seats[seat];
  return training && policy.kind === 'qlearning' ? policy : null;
}

function terminalReward(result: StepResult, seat: Player, rewards: RewardScheme): number {
  if (result.status.kind === 'won') {
    return result.status.winner === seat ? rewards.win : rewards.loss;
  }
  return rewards.draw;
}

/**
 * Plays one game to the end. In training mode each learning seat is
 * updated from its own moves only: the mover is credited at once when its
 * move ends the game, otherwise its move stays pending until the opponent
 * replies and the next state it will see is known.
 */
export function playEpisode(
  game: TicTacToeGame,
  seats: Seats,
  options: EpisodeOptions,
): Outcome {
  const rewards = options.rewards ?? DEFAULT_REWARDS;
  const pending: Record<Player, PendingMove | null> = { 1: null, 2: null };
  game.reset();

  while (!game.isTerminal()) {
    const mover = game.getCurrentPlayer();
    const state = game.getState();
    const legal = game.legalActions(state);
    const action = seats[mover].selectAction(state, legal, options.training);
    const result = game.step(action);

    const opponent = otherPlayer(mover);
    const waiting = learnerAt(seats, opponent, options.training);
    const previous = pending[opponent];
    if (waiting && previous) {
      waiting.update({
        state: previous.state,
        action: previous.action,
        reward: result.terminal ? terminalReward(result, opponent, rewards) : 0,
        nextState: result.state,
        nextLegalActions: result.terminal ? [] : game.legalActions(result.state),
        terminal: result.terminal,
      });
      pending[opponent] = null;
    }

    const learner = learnerAt(seats, mover, options.training);
    if (learner) {
      if (result.terminal) {
        learner.update({
          state,
          action,
          reward: terminalReward(result, mover, rewards),
          nextState: result.state,
          nextLegalActions: [],
          terminal: true,
        });
      } else {
        pending[mover] = { state, action };
      }
    }
  }

  const outcome = game.outcome();
  if (outcome === null) {
    throw new Error('Episode ended without an outcome');
  }
  return outcome;
}

/** Greedy games of `policy` at `seat` against a uniform random opponent. */
export function evaluatePolicy(
  policy: AnyPolicy,
  seat: Player,
  episodes: number,
  random: RandomSource = Math.random,
): SeatTally {
  const game = new TicTacToeGame();
  const opponent = new RandomPolicy(random);
  const seats: Seats = seat === 1 ? { 1: policy, 2: opponent } : { 1: opponent, 2: policy };
  const tally = emptyTally();
  for (let i = 0; i < episodes; i += 1) {
    recordOutcome(tally, seat, playEpisode(game, seats, { training: false }));
  }
  return tally;
}

function buildCheckpoint(
  seats: Seats,
  episode: number,
  options: TrainingOptions,
  evaluationSeed: number,
): TrainingCheckpoint {
  const evaluations: SeatEvaluation[] = [];
  for (const seat of [1, 2] as const) {
    if (seats[seat].kind !== 'qlearning') {
      continue;
    }
    const tally = evaluatePolicy(
      seats[seat],
      seat,
      options.evaluationEpisodes,
      createSeededRandom(evaluationSeed),
    );
    evaluations.push({ seat, tally, rates: toRates(tally) });
  }
  const selfPlay =
    seats[1].kind === 'qlearning' && seats[2].kind === 'qlearning'
      ? playEpisode(new TicTacToeGame(), seats, { training: false })
      : null;
  return { episode, evaluations, selfPlay };
}

export function runTraining(seats: Seats, options: TrainingOptions): TrainingRunResult {
  if (!Number.isInteger(options.episodes) || options.episodes <= 0) {
    throw new RangeError(`Episode count must be a positive integer, received ${options.episodes}`);
  }
  const evaluationSeed = options.evaluationSeed ?? Math.floor(Math.random() * 0x100000000);
  const game = new TicTacToeGame();
  const outcomes = emptyOutcomeCounts();
  const checkpoints: TrainingCheckpoint[] = [];

  for (let episode = 1; episode <= options.episodes; episode += 1) {
    const outcome = playEpisode(game, seats, { training: true, rewards: options.rewards });
    outcomes[outcome] += 1;

    if (options.evaluationInterval > 0 && episode % options.evaluationInterval === 0) {
      const checkpoint = buildCheckpoint(seats, episode, options, evaluationSeed);
      checkpoints.push(checkpoint);
      options.onCheckpoint?.(checkpoint);
    }
  }

  return { episodes: options.episodes, outcomes, checkpoints };
}
