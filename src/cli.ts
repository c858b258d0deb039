#!/usr/bin/env node
import { parseCliArgs, runImport, USAGE } from './app.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Cli');

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (!options) {
    process.stdout.write(USAGE);
    return;
  }

  const summary = await runImport(options);
  logger.info({ ...summary, dryRun: options.dryRun }, 'Done');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Import failed');
  process.exit(1);
});
