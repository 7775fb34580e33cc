import 'dotenv/config';

import { DEFAULT_TABLE_PATHS, loadQTable } from '../ai/persistence';
import { AnyPolicy, createPolicy, isPolicyKind, PolicyKind } from '../ai/policy';
import { TicTacToeGame } from '../core/game';
import { resolveRandom } from '../core/random';
import { Player } from '../core/types';
import { createArgReader } from '../config/args';
import { ConfigError } from '../config/training_config';
import { describeOutcome, emptyTally, formatRates, recordOutcome, toRates } from '../training/common';
import { playEpisode, Seats } from '../training/engine';

interface CliOptions {
  games: number;
  verbose: boolean;
  kinds: Record<Player, PolicyKind>;
  tablePaths: Record<Player, string>;
  seed?: number;
}

function parseOptions(args: readonly string[] = process.argv.slice(2)): CliOptions {
  const reader = createArgReader(args);
  const getKind = (flag: string, fallback: PolicyKind): PolicyKind => {
    const value = reader.getString([flag]) ?? fallback;
    if (!isPolicyKind(value)) {
      throw new ConfigError(`${flag} must be "random" or "qlearning", received "${value}"`);
    }
    return value;
  };
  const getInteger = (flag: string, fallback: string | undefined): number | undefined => {
    const raw = reader.getString([flag]) ?? fallback;
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new ConfigError(`${flag} must be an integer, received "${raw}"`);
    }
    return value;
  };

  const games = getInteger('--games', process.env.PLAY_GAMES ?? '100') ?? 100;
  if (games <= 0) {
    throw new ConfigError(`--games must be positive, received ${games}`);
  }
  return {
    games,
    verbose: reader.hasFlag('--verbose'),
    kinds: {
      1: getKind('--p1', 'qlearning'),
      2: getKind('--p2', 'random'),
    },
    tablePaths: {
      1: reader.getString(['--table-p1']) ?? process.env.Q_TABLE_P1_PATH ?? DEFAULT_TABLE_PATHS[1],
      2: reader.getString(['--table-p2']) ?? process.env.Q_TABLE_P2_PATH ?? DEFAULT_TABLE_PATHS[2],
    },
    seed: getInteger('--seed', process.env.PLAY_SEED),
  };
}

function buildPolicy(seat: Player, options: CliOptions): AnyPolicy {
  const random = resolveRandom(options.seed === undefined ? undefined : options.seed + seat);
  if (options.kinds[seat] === 'random') {
    return createPolicy('random', { random });
  }
  return createPolicy('qlearning', {
    table: loadQTable(options.tablePaths[seat]),
    epsilon: 0,
    random,
  });
}

function main(): void {
  const options = parseOptions();
  const seats: Seats = {
    1: buildPolicy(1, options),
    2: buildPolicy(2, options),
  };
  const game = new TicTacToeGame();
  const player1 = emptyTally();
  const player2 = emptyTally();

  for (let i = 0; i < options.games; i += 1) {
    const outcome = playEpisode(game, seats, { training: false });
    recordOutcome(player1, 1, outcome);
    recordOutcome(player2, 2, outcome);
    if (options.verbose) {
      // eslint-disable-next-line no-console
      console.log(`Game ${i + 1}/${options.games}: ${describeOutcome(outcome)} in ${game.getMoveCount()} moves`);
    }
  }

  // eslint-disable-next-line no-console
  console.log(`[Match] ${options.kinds[1]} (X) vs ${options.kinds[2]} (O), ${options.games} games`);
  // eslint-disable-next-line no-console
  console.log(`P1 ${formatRates(toRates(player1))}`);
  // eslint-disable-next-line no-console
  console.log(`P2 ${formatRates(toRates(player2))}`);
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
}
