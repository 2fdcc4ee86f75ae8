#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { parseConfig, type ServerConfig } from './config';
import { ConfigError } from './errors';
import { createLogger } from './logger';
import { findProjectRoot, readVersion, start } from './server';

const logger = createLogger('Server');

async function main(): Promise<void> {
  const root = findProjectRoot();
  let config: ServerConfig;
  try {
    config = parseConfig(hideBin(process.argv), readVersion(root));
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const servers = await start(config, root);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server...`);
    for (const server of servers) {
      server.close();
      server.closeAllConnections();
    }
    process.exit(0);
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Fatal error during startup:', err);
    process.exit(1);
  });
}
