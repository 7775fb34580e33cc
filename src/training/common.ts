import { Outcome, Player } from '../core/types';

export interface RewardScheme {
  win: number;
  loss: number;
  draw: number;
}

export const DEFAULT_REWARDS: RewardScheme = {
  win: 1,
  loss: -1,
  draw: 0,
};

export interface OutcomeCounts {
  player1: number;
  player2: number;
  draw: number;
}

/** Results from one seat's point of view. */
export interface SeatTally {
  wins: number;
  losses: number;
  ties: number;
}

export interface SeatRates {
  win: number;
  lose: number;
  tie: number;
}

export function emptyOutcomeCounts(): OutcomeCounts {
  return { player1: 0, player2: 0, draw: 0 };
}

export function emptyTally(): SeatTally {
  return { wins: 0, losses: 0, ties: 0 };
}

export function recordOutcome(tally: SeatTally, seat: Player, outcome: Outcome): void {
  if (outcome === 'draw') {
    tally.ties += 1;
  } else if ((outcome === 'player1') === (seat === 1)) {
    tally.wins += 1;
  } else {
    tally.losses += 1;
  }
}

export function toRates(tally: SeatTally): SeatRates {
  const total = tally.wins + tally.losses + tally.ties;
  if (total === 0) {
    return { win: 0, lose: 0, tie: 0 };
  }
  return {
    win: tally.wins / total,
    lose: tally.losses / total,
    tie: tally.ties / total,
  };
}

export function formatPercent(value: number): string {
  if (!Number.isFinite(value)) {
    return '0%';
  }
  return `${Math.round(value * 100)}%`.padStart(4, ' ');
}

export function formatRates(rates: SeatRates): string {
  return `win: ${formatPercent(rates.win)} lose: ${formatPercent(rates.lose)} tie: ${formatPercent(rates.tie)}`;
}

export function describeOutcome(outcome: Outcome): string {
  switch (outcome) {
    case 'player1':
      return 'p1_win';
    case 'player2':
      return 'p2_win';
    default:
      return 'tie';
  }
}
