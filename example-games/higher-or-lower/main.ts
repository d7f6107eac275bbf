/**
 * Higher or Lower -- terminal edition.
 *
 * Usage:
 *   npm run play
 *
 * Configuration comes from the environment (or a .env file); see
 * src/config/env.ts for the variables and their defaults.
 */

import 'dotenv/config';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { createShuffleStrategy } from '../../src/card-system/ShuffleStrategy';
import type { GameConfig } from '../../src/config/env';
import { ConfigError, describeConfig, loadGameConfig } from '../../src/config/env';
import { createLogger, setLogFormat, setLogLevel } from '../../src/core-engine/Logger';
import { setupHigherOrLowerGame } from './HigherOrLowerGame';
import { runHigherOrLower } from './HigherOrLowerConsole';

const log = createLogger('main');

async function main(): Promise<void> {
  let config: GameConfig;
  try {
    config = loadGameConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error('Please check your environment or .env file.');
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  setLogLevel(config.logLevel);
  setLogFormat(config.logFormat);
  log.debug('Configuration loaded', { config: describeConfig(config) });

  const session = setupHigherOrLowerGame({
    roundSize: config.roundSize,
    startingScore: config.startingScore,
    shuffleStrategy: createShuffleStrategy(config.shuffle, { swaps: config.weakSwaps }),
    reshuffleOnDraw: config.reshuffleOnDraw,
  });

  const rl = readline.createInterface({ input, output });
  try {
    await runHigherOrLower(session, {
      ask: (prompt) => rl.question(prompt),
      print: (line) => console.log(line),
    });
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  log.error('Game crashed', {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
