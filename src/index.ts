export * from './core/types';
export * from './core/errors';
export { BOARD_SIZE, CELL_COUNT, GridBoard, WIN_LINES, toIndex } from './core/board';
export { decodeState, encodeState, isStateKey, markerOf, STATE_KEY_PATTERN } from './core/encoding';
export { legalActionsOf, otherPlayer, outcomeOf, TicTacToeGame } from './core/game';
export { createSeededRandom, pickUniform, resolveRandom } from './core/random';
export type { RandomSource } from './core/random';
export { QTable, QTableSnapshotSchema } from './ai/q_table';
export type { QTableEntry, QTableSnapshot } from './ai/q_table';
export {
  DEFAULT_TABLE_PATHS,
  loadQTable,
  loadQTableIfExists,
  resolveTablePath,
  saveQTable,
} from './ai/persistence';
export {
  createPolicy,
  DEFAULT_QLEARNING_OPTIONS,
  isPolicyKind,
  QLearningPolicy,
  RandomPolicy,
} from './ai/policy';
export type { AnyPolicy, Policy, PolicyKind, QLearningOptions } from './ai/policy';
export * from './training/common';
export * from './training/engine';
export { ConfigError, DEFAULT_TRAINING_CONFIG, resolveTrainingConfig } from './config/training_config';
export type { TrainingConfig, TrainingOpponent } from './config/training_config';
export { DEFAULT_SERVER_CONFIG, loadServerConfigFromEnv } from './config/server_config';
export type { ServerConfig } from './config/server_config';
export { PlaySession } from './play/session';
export type { HumanResult, PlaySnapshot } from './play/session';
export { createServer, SessionNotFoundError } from './server/app';
export type { ServerOptions } from './server/app';
