import 'dotenv/config';

import { loadQTableIfExists } from '../ai/persistence';
import { QLearningPolicy } from '../ai/policy';
import { loadServerConfigFromEnv } from '../config/server_config';
import { createServer } from './app';

function main(): void {
  const config = loadServerConfigFromEnv();
  const agents = {
    1: new QLearningPolicy({ table: loadQTableIfExists(config.tableP1Path), epsilon: 0 }),
    2: new QLearningPolicy({ table: loadQTableIfExists(config.tableP2Path), epsilon: 0 }),
  };
  const app = createServer({ agents, maxSessions: config.maxSessions });
  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Tic-tac-toe play server running at http://localhost:${config.port} (P1 states=${agents[1].getTable().stateCount}, P2 states=${agents[2].getTable().stateCount})`,
    );
  });
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
}
