#!/usr/bin/env node
import { createScheduler, resolveConfig } from './app';
import { errorMessage } from './types/errors';
import { logger } from './utils/logger';

/** Runs a single cycle. Regions given as arguments replace the configured ones. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const config = await resolveConfig();
    const regions = argv.filter((arg) => arg.trim().length > 0);
    const scheduler = createScheduler(regions.length > 0 ? { ...config, regions } : config);
    await scheduler.runCycle();
    return 0;
  } catch (error) {
    logger.fatal({ component: 'scheduler', error: errorMessage(error) }, 'Power scheduler cycle failed');
    return 1;
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  });
}
