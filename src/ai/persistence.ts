import fs from 'fs';
import path from 'path';

import { PersistenceError } from '../core/errors';
import { QTable } from './q_table';

export const DEFAULT_TABLE_PATHS = {
  1: 'q_table_player1.json',
  2: 'q_table_player2.json',
} as const;

export function resolveTablePath(tablePath: string): string {
  return path.resolve(process.cwd(), tablePath);
}

export function loadQTable(tablePath: string): QTable {
  const resolved = resolveTablePath(tablePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new PersistenceError('Unable to read Q-table', resolved, error);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError('Q-table is not valid JSON', resolved, error);
  }
  return QTable.fromJSON(parsed, resolved);
}

/** Loads the table when the file exists, otherwise starts an empty one. */
export function loadQTableIfExists(tablePath: string, defaultValue = 0): QTable {
  const resolved = resolveTablePath(tablePath);
  if (!fs.existsSync(resolved)) {
    return new QTable(defaultValue);
  }
  return loadQTable(resolved);
}

export function saveQTable(tablePath: string, table: QTable): string {
  const resolved = resolveTablePath(tablePath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(table.toJSON(), null, 2), {
      encoding: 'utf-8',
    });
  } catch (error) {
    throw new PersistenceError('Unable to write Q-table', resolved, error);
  }
  return resolved;
}
