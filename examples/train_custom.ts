/**
 * Custom configuration training example
 */

import { QLearningPolicy, RandomPolicy } from '../src/ai/policy';
import { createSeededRandom } from '../src/core/random';
import { formatRates } from '../src/training/common';
import { runTraining } from '../src/training/engine';

console.log('Q-learning against Random with a custom configuration\n');

const learner = new QLearningPolicy({
  alpha: 0.5, // Learning rate
  gamma: 0.9, // Discount for the next decision
  epsilon: 0.1, // Random move chance while training
  random: createSeededRandom(42),
});

const result = runTraining(
  { 1: learner, 2: new RandomPolicy(createSeededRandom(43)) },
  {
    episodes: 20000,
    evaluationInterval: 2000,
    evaluationEpisodes: 200,
    rewards: { win: 1, loss: -1, draw: 0.5 },
    evaluationSeed: 44,
    onCheckpoint: (checkpoint) => {
      const evaluation = checkpoint.evaluations[0];
      if (evaluation) {
        console.log(`episode ${checkpoint.episode}: ${formatRates(evaluation.rates)}`);
      }
    },
  },
);

console.log('\n=== Training Results ===');
console.log(`Episodes: ${result.episodes}`);
console.log(`P1 wins: ${result.outcomes.player1}`);
console.log(`P2 wins: ${result.outcomes.player2}`);
console.log(`Draws: ${result.outcomes.draw}`);
console.log(`States visited: ${learner.getTable().stateCount}`);
