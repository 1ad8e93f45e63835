/**
 * Local entry point for the kitchen simulator.
 *
 * Run with: npm start
 */

import { createLogger, describeError } from '@kitchen-sim/core';
import { loadEnvFile, startLocalServer } from '@kitchen-sim/core/node';
import { resolveConfig } from './config.js';
import { createKitchenContext } from './kitchen.js';
import { PushChannel } from './push-channel.js';
import { createKitchenServer } from './server.js';

// .dev.vars / .env first, process environment on top
const env = { ...loadEnvFile(), ...process.env };
const { config, warnings } = resolveConfig(env);
const logger = createLogger('kitchen', config.logLevel);

for (const warning of warnings) {
  logger.warn(`Config: ${warning}`);
}

const kitchen = createKitchenContext({ logLevel: config.logLevel, tickMs: config.tickMs });
const push = new PushChannel({
  broadcaster: kitchen.broadcaster,
  path: config.push.path,
  maxBufferedBytes: config.push.maxBufferedBytes,
  logger: createLogger('push', config.logLevel),
});
const server = createKitchenServer({ config, kitchen, logger: createLogger('server', config.logLevel) });

const handle = startLocalServer(server, {
  port: config.http.port,
  host: config.http.host,
  logger,
  onUpgrade: push.handleUpgrade,
});

handle.listening
  .then(() => logger.info(`Push channel at ws://${config.http.host}:${handle.port}${config.push.path}`))
  .catch((error: unknown) => {
    logger.error(`Failed to start: ${describeError(error)}`);
    process.exit(1);
  });

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  kitchen.shutdown();
  await push.close();
  await handle.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
  });
}
