#!/usr/bin/env node
import 'dotenv/config';
import { helpText, runCommand } from './cli.js';
import { parseArgs } from './config.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('crawl');

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'help') {
    console.log(helpText());
    return;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('interrupted; finishing in-flight fetches');
    controller.abort();
  });

  await runCommand(args, process.env, { logger: log, signal: controller.signal });
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    log.error(`configuration error: ${err.message}`);
    process.exit(2);
  }
  log.error('failed', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
  process.exit(1);
});
