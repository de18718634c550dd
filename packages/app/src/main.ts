#!/usr/bin/env node
import * as path from 'node:path';
import { errorMessage } from '@agentnet/core';
import { bootstrap } from './bootstrap.js';

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? path.resolve(process.cwd(), 'config/default.json5');
  const app = await bootstrap({ configPath });
  const { logger } = app;

  const handleShutdown = (): void => {
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  logger.info(`agentnet gateway on port ${app.gateway.port ?? app.config.server.port}`);
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
