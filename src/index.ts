#!/usr/bin/env node

import 'dotenv/config';

import { Logger } from './utils/logger.js';
import { loadConfig } from './utils/config.js';
import { isListError } from './utils/errors.js';
import { initTelemetry, shutdownTelemetry } from './utils/telemetry.js';
import { createListSession } from './sources/sharepoint-list.js';
import { USAGE, parseCliArgs, run } from './cli.js';

const logger = new Logger('sp-list-export');

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig();
  logger.setLevel(config.logLevel);
  initTelemetry(config);

  const session = createListSession(config, logger);
  try {
    await run(options, config, session, logger);
  } finally {
    await session.close();
    await shutdownTelemetry();
  }
}

main().catch((error: unknown) => {
  if (isListError(error)) {
    logger.error('main', {
      action: 'failed',
      code: error.code,
      status: error.status ?? null,
      error: error.message,
    });
  } else {
    logger.critical('main', {
      action: 'failed',
      error: error instanceof Error ? error.message : String(error),
    });
  }
  process.exitCode = 1;
});
