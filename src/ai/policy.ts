import { pickUniform, RandomSource } from '../core/random';
import { Action, StateKey, Transition } from '../core/types';
import { QTable } from './q_table';

export type PolicyKind = 'random' | 'qlearning';

export const POLICY_KINDS: readonly PolicyKind[] = ['random', 'qlearning'];

export interface Policy {
  readonly kind: PolicyKind;
  selectAction(state: StateKey, legalActions: readonly Action[], training: boolean): Action;
}

function ensureActions(legalActions: readonly Action[]): void {
  if (legalActions.length === 0) {
    throw new Error('No legal actions to choose from');
  }
}

export class RandomPolicy implements Policy {
  public readonly kind = 'random' as const;
  private readonly random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  selectAction(_state: StateKey, legalActions: readonly Action[]): Action {
    ensureActions(legalActions);
    return pickUniform(legalActions, this.random);
  }
}

export interface QLearningOptions {
  /** Learning rate α. */
  alpha: number;
  /** Discount factor γ. */
  gamma: number;
  /** Exploration rate ε, only applied while training. */
  epsilon: number;
  table?: QTable;
  random?: RandomSource;
}

export const DEFAULT_QLEARNING_OPTIONS: Readonly<Pick<QLearningOptions, 'alpha' | 'gamma' | 'epsilon'>> = {
  alpha: 0.1,
  gamma: 0.96,
  epsilon: 0.1,
};

export class QLearningPolicy implements Policy {
  public readonly kind = 'qlearning' as const;
  public readonly alpha: number;
  public readonly gamma: number;
  private epsilonValue: number;
  private readonly table: QTable;
  private readonly random: RandomSource;

  constructor(options: Partial<QLearningOptions> = {}) {
    this.alpha = options.alpha ?? DEFAULT_QLEARNING_OPTIONS.alpha;
    this.gamma = options.gamma ?? DEFAULT_QLEARNING_OPTIONS.gamma;
    this.epsilonValue = options.epsilon ?? DEFAULT_QLEARNING_OPTIONS.epsilon;
    this.table = options.table ?? new QTable();
    this.random = options.random ?? Math.random;
    if (!(this.alpha > 0 && this.alpha <= 1)) {
      throw new RangeError(`alpha must be in (0, 1], received ${this.alpha}`);
    }
    if (!(this.gamma >= 0 && this.gamma <= 1)) {
      throw new RangeError(`gamma must be in [0, 1], received ${this.gamma}`);
    }
    this.setEpsilon(this.epsilonValue);
  }

  get epsilon(): number {
    return this.epsilonValue;
  }

  setEpsilon(epsilon: number): void {
    if (!(epsilon >= 0 && epsilon <= 1)) {
      throw new RangeError(`epsilon must be in [0, 1], received ${epsilon}`);
    }
    this.epsilonValue = epsilon;
  }

  getTable(): QTable {
    return this.table;
  }

  selectAction(state: StateKey, legalActions: readonly Action[], training: boolean): Action {
    ensureActions(legalActions);
    if (training && this.epsilonValue > 0 && this.random() < this.epsilonValue) {
      return pickUniform(legalActions, this.random);
    }
    return this.greedyAction(state, legalActions);
  }

  /** Highest-valued legal action; ties go to the lowest index. */
  greedyAction(state: StateKey, legalActions: readonly Action[]): Action {
    ensureActions(legalActions);
    const ordered = [...legalActions].sort((a, b) => a - b);
    let best = ordered[0] ?? 0;
    let bestValue = this.table.get(state, best);
    for (const action of ordered.slice(1)) {
      const value = this.table.get(state, action);
      if (value > bestValue) {
        best = action;
        bestValue = value;
      }
    }
    return best;
  }

  update(transition: Transition): number {
    const { state, action, reward, nextState, nextLegalActions, terminal } = transition;
    const current = this.table.get(state, action);
    const nextValue = terminal ? 0 : this.table.maxValue(nextState, nextLegalActions);
    const updated = current + this.alpha * (reward + this.gamma * nextValue - current);
    this.table.set(state, action, updated);
    return updated;
  }
}

export type AnyPolicy = RandomPolicy | QLearningPolicy;

export function createPolicy(kind: PolicyKind, options: Partial<QLearningOptions> = {}): AnyPolicy {
  switch (kind) {
    case 'random':
      return new RandomPolicy(options.random);
    case 'qlearning':
      return new QLearningPolicy(options);
  }
}

export function isPolicyKind(value: string): value is PolicyKind {
  return POLICY_KINDS.some((kind) => kind === value);
}
