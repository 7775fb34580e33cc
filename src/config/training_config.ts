/**
 * Training configuration
 *
 * Every setting has a default, can be overridden from the environment
 * (including a `.env` file loaded by the entry points), and command-line
 * flags override the environment.
 */

import { z } from 'zod';

import { DEFAULT_TABLE_PATHS } from '../ai/persistence';
import { DEFAULT_QLEARNING_OPTIONS } from '../ai/policy';
import { compact, createArgReader } from './args';

export type TrainingOpponent = 'self' | 'random';

export interface TrainingConfig {
  /** Number of training episodes (games). */
  episodes: number;

  /** Learning rate α. */
  alpha: number;

  /** Discount factor γ. */
  gamma: number;

  /** Exploration rate ε used while training. */
  epsilon: number;

  /** Episodes between evaluation checkpoints; 0 disables them. */
  evaluationInterval: number;

  /** Games played against Random at each checkpoint, per learning seat. */
  evaluationEpisodes: number;

  /** `self`: both seats learn. `random`: player 1 learns against Random. */
  opponent: TrainingOpponent;

  tableP1Path: string;
  tableP2Path: string;

  seed?: number;

  /** Where to write the checkpoint history as JSON. */
  historyPath?: string;
}

export const DEFAULT_TRAINING_CONFIG: Omit<TrainingConfig, 'episodes'> = {
  alpha: DEFAULT_QLEARNING_OPTIONS.alpha,
  gamma: DEFAULT_QLEARNING_OPTIONS.gamma,
  epsilon: DEFAULT_QLEARNING_OPTIONS.epsilon,
  evaluationInterval: 1000,
  evaluationEpisodes: 100,
  opponent: 'self',
  tableP1Path: DEFAULT_TABLE_PATHS[1],
  tableP2Path: DEFAULT_TABLE_PATHS[2],
};

const TrainingConfigSchema = z.object({
  episodes: z.coerce.number().int().positive(),
  alpha: z.coerce.number().gt(0).max(1),
  gamma: z.coerce.number().min(0).max(1),
  epsilon: z.coerce.number().min(0).max(1),
  evaluationInterval: z.coerce.number().int().nonnegative(),
  evaluationEpisodes: z.coerce.number().int().positive(),
  opponent: z.enum(['self', 'random']),
  tableP1Path: z.string().min(1),
  tableP2Path: z.string().min(1),
  seed: z.coerce.number().int().optional(),
  historyPath: z.string().min(1).optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type RawConfig = Record<string, string | number | undefined>;

export function loadTrainingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  return compact({
    episodes: env.TRAIN_EPISODES,
    alpha: env.TRAIN_ALPHA,
    gamma: env.TRAIN_GAMMA,
    epsilon: env.TRAIN_EPSILON,
    evaluationInterval: env.TRAIN_EVAL_INTERVAL,
    evaluationEpisodes: env.TRAIN_EVAL_EPISODES,
    opponent: env.TRAIN_OPPONENT,
    tableP1Path: env.Q_TABLE_P1_PATH,
    tableP2Path: env.Q_TABLE_P2_PATH,
    seed: env.TRAIN_SEED,
    historyPath: env.TRAIN_HISTORY_PATH,
  });
}

export function parseTrainingArgs(args: readonly string[]): RawConfig {
  const reader = createArgReader(args);
  return compact({
    episodes: reader.getString(['-n', '--num', '--episodes']),
    alpha: reader.getString(['--alpha']),
    gamma: reader.getString(['--gamma']),
    epsilon: reader.getString(['--epsilon']),
    evaluationInterval: reader.getString(['--eval-interval']),
    evaluationEpisodes: reader.getString(['--eval-episodes']),
    opponent: reader.getString(['--opponent']),
    tableP1Path: reader.getString(['--table-p1']),
    tableP2Path: reader.getString(['--table-p2']),
    seed: reader.getString(['--seed']),
    historyPath: reader.getString(['--history']),
  });
}

export function resolveTrainingConfig(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): TrainingConfig {
  const merged: RawConfig = {
    ...DEFAULT_TRAINING_CONFIG,
    ...loadTrainingConfigFromEnv(env),
    ...parseTrainingArgs(args),
  };
  if (merged.episodes === undefined) {
    throw new ConfigError('An episode count is required (-n <count> or TRAIN_EPISODES)');
  }
  const parsed = TrainingConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid training configuration: ${details}`);
  }
  return parsed.data;
}
