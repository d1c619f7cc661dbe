#!/usr/bin/env node
/**
 * routewise [--config <path>] [--no-serve]
 */

import { parseArgs } from 'node:util';
import { loadConfig } from './config.js';
import { RoutewiseService } from './service.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      'no-serve': { type: 'boolean', default: false },
    },
  });

  const config = loadConfig(values.config);
  const service = new RoutewiseService(config);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    service.logger.info('Shutting down', { signal });
    service.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        service.logger.error('Shutdown failed', error instanceof Error ? error : { error: String(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await service.start({ serve: !values['no-serve'] });
}

main().catch((error: unknown) => {
  console.error('routewise failed to start:', error);
  process.exit(1);
});
