import { describe, expect, it, vi } from 'vitest';

import { createSeededRandom } from '../../core/random';
import { createPolicy, isPolicyKind, QLearningPolicy, RandomPolicy } from '../policy';
import { QTable } from '../q_table';

const EMPTY = '.........:X';
const NEXT = 'X...O....:X';
const ALL_CELLS = [0, 1, 2, 3, 4, 5, 6, 7, 8];

describe('QLearningPolicy.update', () => {
  it('moves a terminal win halfway to the reward with alpha 0.5', () => {
    const policy = new QLearningPolicy({ alpha: 0.5, gamma: 0.9, epsilon: 0 });
    const value = policy.update({
      state: EMPTY,
      action: 4,
      reward: 1,
      nextState: NEXT,
      nextLegalActions: [],
      terminal: true,
    });
    expect(value).toBe(0.5);
    expect(policy.getTable().get(EMPTY, 4)).toBe(0.5);
  });

  it('does not bootstrap past a terminal state', () => {
    const table = new QTable();
    table.set(NEXT, 3, 10);
    const policy = new QLearningPolicy({ alpha: 0.5, gamma: 0.9, epsilon: 0, table });
    policy.update({
      state: EMPTY,
      action: 4,
      reward: -1,
      nextState: NEXT,
      nextLegalActions: [3],
      terminal: true,
    });
    expect(table.get(EMPTY, 4)).toBe(-0.5);
  });

  it('bootstraps from the best next legal action only', () => {
    const table = new QTable();
    table.set(NEXT, 1, 5);
    table.set(NEXT, 3, 0.4);
    table.set(NEXT, 5, 0.8);
    const policy = new QLearningPolicy({ alpha: 0.5, gamma: 0.9, epsilon: 0, table });
    policy.update({
      state: EMPTY,
      action: 0,
      reward: 0,
      nextState: NEXT,
      nextLegalActions: [3, 5, 7],
      terminal: false,
    });
    expect(table.get(EMPTY, 0)).toBeCloseTo(0.36, 12);
  });

  it('builds on the current estimate', () => {
    const table = new QTable();
    table.set(EMPTY, 2, 0.5);
    const policy = new QLearningPolicy({ alpha: 0.5, gamma: 0.9, epsilon: 0, table });
    policy.update({
      state: EMPTY,
      action: 2,
      reward: 1,
      nextState: NEXT,
      nextLegalActions: [],
      terminal: true,
    });
    expect(table.get(EMPTY, 2)).toBe(0.75);
  });
});

describe('QLearningPolicy.selectAction', () => {
  it('breaks ties by the lowest index', () => {
    const policy = new QLearningPolicy({ epsilon: 0 });
    expect(policy.selectAction(EMPTY, [7, 5, 2], false)).toBe(2);
    expect(policy.selectAction(EMPTY, ALL_CELLS, true)).toBe(0);
  });

  it('picks the highest value, including over negative neighbours', () => {
    const table = new QTable();
    table.set(EMPTY, 2, -1);
    table.set(EMPTY, 7, 0.3);
    const policy = new QLearningPolicy({ epsilon: 0, table });
    expect(policy.selectAction(EMPTY, [2, 5, 7], false)).toBe(7);
    table.set(EMPTY, 7, -0.3);
    expect(policy.selectAction(EMPTY, [2, 5, 7], false)).toBe(5);
  });

  it('never explores outside training', () => {
    const random = vi.fn(() => 0);
    const policy = new QLearningPolicy({ epsilon: 1, random });
    expect(policy.selectAction(EMPTY, [6, 8], false)).toBe(6);
    expect(random).not.toHaveBeenCalled();
  });

  it('explores uniformly over the empty board when epsilon is 1', () => {
    const policy = new QLearningPolicy({ epsilon: 1, random: createSeededRandom(7) });
    const counts = new Array<number>(9).fill(0);
    const trials = 9000;
    for (let i = 0; i < trials; i += 1) {
      const action = policy.selectAction(EMPTY, ALL_CELLS, true);
      counts[action] = (counts[action] ?? 0) + 1;
    }
    expect(counts.reduce((sum, count) => sum + count, 0)).toBe(trials);
    for (const count of counts) {
      expect(count).toBeGreaterThan(850);
      expect(count).toBeLessThan(1150);
    }
    expect(policy.getTable().size).toBe(0);
  });

  it('refuses an empty legal set', () => {
    const policy = new QLearningPolicy();
    expect(() => policy.selectAction(EMPTY, [], true)).toThrow('No legal actions to choose from');
  });

  it('validates hyperparameters', () => {
    expect(() => new QLearningPolicy({ alpha: 0 })).toThrow(RangeError);
    expect(() => new QLearningPolicy({ gamma: 1.5 })).toThrow(RangeError);
    expect(() => new QLearningPolicy({ epsilon: -0.1 })).toThrow(RangeError);
    const policy = new QLearningPolicy();
    policy.setEpsilon(0.3);
    expect(policy.epsilon).toBe(0.3);
  });
});

describe('RandomPolicy', () => {
  it('only returns legal actions', () => {
    const policy = new RandomPolicy(createSeededRandom(11));
    const legal = [1, 4, 6];
    for (let i = 0; i < 200; i += 1) {
      expect(legal).toContain(policy.selectAction(EMPTY, legal));
    }
  });

  it('follows its random source', () => {
    expect(new RandomPolicy(() => 0).selectAction(EMPTY, [3, 5, 8])).toBe(3);
    expect(new RandomPolicy(() => 0.999).selectAction(EMPTY, [3, 5, 8])).toBe(8);
    expect(new RandomPolicy(() => 0.5).selectAction(EMPTY, [3, 5, 8])).toBe(5);
  });
});

describe('createPolicy', () => {
  it('builds each variant by name', () => {
    expect(createPolicy('random').kind).toBe('random');
    const learner = createPolicy('qlearning', { alpha: 0.2, gamma: 0.8, epsilon: 0.05 });
    expect(learner).toBeInstanceOf(QLearningPolicy);
    if (learner instanceof QLearningPolicy) {
      expect([learner.alpha, learner.gamma, learner.epsilon]).toEqual([0.2, 0.8, 0.05]);
    }
  });

  it('recognises policy names', () => {
    expect(isPolicyKind('qlearning')).toBe(true);
    expect(isPolicyKind('minimax')).toBe(false);
  });
});
