import { z } from 'zod';

import { DEFAULT_TABLE_PATHS } from '../ai/persistence';
import { compact } from './args';
import { ConfigError } from './training_config';

export interface ServerConfig {
  port: number;
  /** Open games kept in memory; the oldest is dropped beyond this. */
  maxSessions: number;
  tableP1Path: string;
  tableP2Path: string;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 5173,
  maxSessions: 1000,
  tableP1Path: DEFAULT_TABLE_PATHS[1],
  tableP2Path: DEFAULT_TABLE_PATHS[2],
};

const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  maxSessions: z.coerce.number().int().positive(),
  tableP1Path: z.string().min(1),
  tableP2Path: z.string().min(1),
});

export function loadServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse({
    ...DEFAULT_SERVER_CONFIG,
    ...compact({
      port: env.PORT,
      maxSessions: env.PLAY_MAX_SESSIONS,
      tableP1Path: env.Q_TABLE_P1_PATH,
      tableP2Path: env.Q_TABLE_P2_PATH,
    }),
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid server configuration: ${details}`);
  }
  return parsed.data;
}
