import { z } from 'zod';

import { CELL_COUNT } from '../core/board';
import { isStateKey, STATE_KEY_PATTERN } from '../core/encoding';
import { PersistenceError } from '../core/errors';
import { Action, StateKey } from '../core/types';

export const Q_TABLE_FORMAT_VERSION = 1;

const ActionKeySchema = z.string().regex(/^[0-8]$/, 'action must be a cell index 0-8');

export const QTableSnapshotSchema = z
  .object({
    version: z.literal(Q_TABLE_FORMAT_VERSION),
    defaultValue: z.number().finite(),
    states: z.record(
      z.string().regex(STATE_KEY_PATTERN, 'malformed state key'),
      z.record(ActionKeySchema, z.number().finite()),
    ),
  })
  .strict();

export type QTableSnapshot = z.infer<typeof QTableSnapshotSchema>;

export interface QTableEntry {
  state: StateKey;
  action: Action;
  value: number;
}

function assertAction(action: Action): void {
  if (!Number.isInteger(action) || action < 0 || action >= CELL_COUNT) {
    throw new RangeError(`Action ${action} is not a cell index`);
  }
}

/**
 * State-action values keyed by `StateKey` then action. Reads of unseen pairs
 * return `defaultValue` and leave the table untouched.
 */
export class QTable {
  public readonly defaultValue: number;
  private readonly table = new Map<StateKey, Map<Action, number>>();

  constructor(defaultValue = 0) {
    if (!Number.isFinite(defaultValue)) {
      throw new RangeError(`Default value must be finite, received ${defaultValue}`);
    }
    this.defaultValue = defaultValue;
  }

  get(state: StateKey, action: Action): number {
    return this.table.get(state)?.get(action) ?? this.defaultValue;
  }

  has(state: StateKey, action: Action): boolean {
    return this.table.get(state)?.has(action) ?? false;
  }

  set(state: StateKey, action: Action, value: number): void {
    if (!isStateKey(state)) {
      throw new RangeError(`Malformed state key "${state}"`);
    }
    assertAction(action);
    if (!Number.isFinite(value)) {
      throw new RangeError(`Q(${state}, ${action}) must be finite, received ${value}`);
    }
    let actions = this.table.get(state);
    if (!actions) {
      actions = new Map();
      this.table.set(state, actions);
    }
    actions.set(action, value);
  }

  /** Largest value over `actions`; 0 when there are none. */
  maxValue(state: StateKey, actions: readonly Action[]): number {
    let best = Number.NEGATIVE_INFINITY;
    for (const action of actions) {
      best = Math.max(best, this.get(state, action));
    }
    return best === Number.NEGATIVE_INFINITY ? 0 : best;
  }

  get size(): number {
    let total = 0;
    for (const actions of this.table.values()) {
      total += actions.size;
    }
    return total;
  }

  get stateCount(): number {
    return this.table.size;
  }

  *entries(): IterableIterator<QTableEntry> {
    for (const [state, actions] of this.table) {
      for (const [action, value] of actions) {
        yield { state, action, value };
      }
    }
  }

  clone(): QTable {
    const copy = new QTable(this.defaultValue);
    for (const { state, action, value } of this.entries()) {
      copy.set(state, action, value);
    }
    return copy;
  }

  toJSON(): QTableSnapshot {
    const states: Record<string, Record<string, number>> = {};
    for (const [state, actions] of this.table) {
      const row: Record<string, number> = {};
      for (const [action, value] of actions) {
        row[String(action)] = value;
      }
      states[state] = row;
    }
    return {
      version: Q_TABLE_FORMAT_VERSION,
      defaultValue: this.defaultValue,
      states,
    };
  }

  static fromJSON(data: unknown, source: string | null = null): QTable {
    const parsed = QTableSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown shape';
      throw new PersistenceError(`Malformed Q-table, ${detail}`, source, parsed.error);
    }
    const table = new QTable(parsed.data.defaultValue);
    for (const [state, actions] of Object.entries(parsed.data.states)) {
      for (const [action, value] of Object.entries(actions)) {
        table.set(state, Number(action), value);
      }
    }
    return table;
  }
}
