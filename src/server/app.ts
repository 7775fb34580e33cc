import express, { ErrorRequestHandler, Express } from 'express';
import { z, ZodError } from 'zod';

import { createPolicy, Policy } from '../ai/policy';
import { GameError, GameOverError, InvalidActionError } from '../core/errors';
import { RandomSource } from '../core/random';
import { Player } from '../core/types';
import { PlaySession } from '../play/session';

const NewGameSchema = z
  .object({
    humanPlayer: z.union([z.literal(1), z.literal(2)]).default(1),
    agent: z.enum(['random', 'qlearning']).default('qlearning'),
  })
  .strict();

const MoveSchema = z
  .object({
    action: z.number().int(),
  })
  .strict();

export interface ServerOptions {
  /** Trained agent for each seat, used when a game asks for `qlearning`. */
  agents: Record<Player, Policy>;
  maxSessions?: number;
  /** Drives the opponents of games that ask for `random`. */
  random?: RandomSource;
}

export class SessionNotFoundError extends GameError {
  constructor(id: string) {
    super(`No game with id "${id}"`);
  }
}

/** Status carried by request errors such as body-parser's, when it is a 4xx. */
function clientStatusOf(error: unknown): number | null {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return null;
}

export function statusForError(error: unknown): number {
  if (error instanceof ZodError || error instanceof InvalidActionError) {
    return 400;
  }
  if (error instanceof SessionNotFoundError) {
    return 404;
  }
  if (error instanceof GameOverError) {
    return 409;
  }
  return clientStatusOf(error) ?? 500;
}

function createSessionId(): string {
  return `game_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

export function createServer(options: ServerOptions): Express {
  const sessions = new Map<string, PlaySession>();
  const maxSessions = options.maxSessions ?? 1000;
  if (!Number.isInteger(maxSessions) || maxSessions <= 0) {
    throw new RangeError(`maxSessions must be a positive integer, received ${maxSessions}`);
  }

  const findSession = (id: string): PlaySession => {
    const session = sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  };

  const app = express();
  app.use(express.json());

  app.post('/api/games', (req, res) => {
    const { humanPlayer, agent } = NewGameSchema.parse(req.body ?? {});
    const agentSeat: Player = humanPlayer === 1 ? 2 : 1;
    const opponent =
      agent === 'random'
        ? createPolicy('random', { random: options.random })
        : options.agents[agentSeat];
    const session = new PlaySession(opponent, humanPlayer);
    const id = createSessionId();
    if (sessions.size >= maxSessions) {
      const oldest = sessions.keys().next();
      if (!oldest.done) {
        sessions.delete(oldest.value);
      }
    }
    sessions.set(id, session);
    res.status(201).json({ id, ...session.start() });
  });

  app.get('/api/games/:id', (req, res) => {
    const { id } = req.params;
    res.json({ id, ...findSession(id).snapshot() });
  });

  app.post('/api/games/:id/moves', (req, res) => {
    const { id } = req.params;
    const session = findSession(id);
    const { action } = MoveSchema.parse(req.body);
    res.json({ id, ...session.humanMove(action) });
  });

  app.delete('/api/games/:id', (req, res) => {
    const { id } = req.params;
    findSession(id);
    sessions.delete(id);
    res.status(204).end();
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    const status = statusForError(error);
    const message = error instanceof Error ? error.message : String(error);
    if (status >= 500) {
      // eslint-disable-next-line no-console
      console.error(error);
    }
    res.status(status).json({
      error: error instanceof Error ? error.name : 'Error',
      message,
      ...(error instanceof ZodError ? { issues: error.issues } : {}),
    });
  };
  app.use(handleError);

  return app;
}
