import 'dotenv/config';
import fs from 'fs';
import path from 'path';

import { loadQTableIfExists, saveQTable } from '../ai/persistence';
import { QLearningPolicy, RandomPolicy } from '../ai/policy';
import { resolveRandom } from '../core/random';
import { resolveTrainingConfig, TrainingConfig } from '../config/training_config';
import { describeOutcome, formatRates } from './common';
import { runTraining, Seats, TrainingCheckpoint } from './engine';

function formatCheckpoint(checkpoint: TrainingCheckpoint): string {
  const lines = [`game${String(checkpoint.episode).padStart(9, ' ')}:`];
  for (const evaluation of checkpoint.evaluations) {
    const label =
      evaluation.seat === 1
        ? 'QLearningPolicy vs RandomPolicy'
        : 'RandomPolicy vs QLearningPolicy';
    lines.push(`    ${label}: ${formatRates(evaluation.rates)}`);
  }
  if (checkpoint.selfPlay !== null) {
    lines.push(`    Self play: ${describeOutcome(checkpoint.selfPlay)}`);
  }
  return lines.join('\n');
}

function buildSeats(config: TrainingConfig): Seats {
  const random = resolveRandom(config.seed);
  const hyper = { alpha: config.alpha, gamma: config.gamma, epsilon: config.epsilon, random };
  const player1 = new QLearningPolicy({ ...hyper, table: loadQTableIfExists(config.tableP1Path) });
  if (config.opponent === 'random') {
    return { 1: player1, 2: new RandomPolicy(random) };
  }
  const player2 = new QLearningPolicy({ ...hyper, table: loadQTableIfExists(config.tableP2Path) });
  return { 1: player1, 2: player2 };
}

function writeHistory(targetPath: string, checkpoints: TrainingCheckpoint[]): string {
  const resolved = path.resolve(process.cwd(), targetPath);
  fs.writeFileSync(resolved, JSON.stringify(checkpoints, null, 2), {
    encoding: 'utf-8',
  });
  return resolved;
}

function main(): void {
  const config = resolveTrainingConfig();
  const seats = buildSeats(config);

  const result = runTraining(seats, {
    episodes: config.episodes,
    evaluationInterval: config.evaluationInterval,
    evaluationEpisodes: config.evaluationEpisodes,
    evaluationSeed: config.seed === undefined ? undefined : config.seed + 1,
    onCheckpoint: (checkpoint) => {
      // eslint-disable-next-line no-console
      console.log(`${formatCheckpoint(checkpoint)}\n`);
    },
  });

  const saved: string[] = [];
  if (seats[1].kind === 'qlearning') {
    saved.push(`P1: ${saveQTable(config.tableP1Path, seats[1].getTable())}`);
  }
  if (seats[2].kind === 'qlearning') {
    saved.push(`P2: ${saveQTable(config.tableP2Path, seats[2].getTable())}`);
  }

  const { outcomes } = result;
  // eslint-disable-next-line no-console
  console.log(
    `Training complete: episodes=${result.episodes}, p1_win=${outcomes.player1}, p2_win=${outcomes.player2}, tie=${outcomes.draw}`,
  );
  // eslint-disable-next-line no-console
  console.log(`Q-tables saved -> ${saved.join(', ')}`);

  if (config.historyPath) {
    // eslint-disable-next-line no-console
    console.log(`Checkpoint history -> ${writeHistory(config.historyPath, result.checkpoints)}`);
  }
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
}
