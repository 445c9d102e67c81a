import { requireStartUrl, resolveConfig } from './config.js';
import type { CliArgs, Env } from './config.js';
import { Crawler } from './crawler.js';
import type { CrawlerDeps, RunOptions } from './crawler.js';
import type { Logger } from './logger.js';
import { ResultSink } from './sink.js';
import type { CrawlSummary } from './types.js';

export type CliDeps = CrawlerDeps & RunOptions & {
  logger: Logger;
  now?: () => Date;
};

export type RunResult = {
  summary: CrawlSummary;
  outPath: string;
};

/**
 * Runs a `crawl` or `paginate` command end to end. Configuration is resolved
 * and validated in full before the crawler is built.
 */
export async function runCommand(args: CliArgs, env: Env, deps: CliDeps): Promise<RunResult> {
  if (args.command === 'help') throw new Error('runCommand does not handle help');
  const startUrl = requireStartUrl(args);
  const cfg = resolveConfig(args, env);
  const log = deps.logger;

  const crawler = new Crawler(cfg, deps);
  log.info(`${args.command}: ${startUrl}`, { maxPages: cfg.maxPages, format: cfg.outputFormat });

  const summary =
    args.command === 'crawl'
      ? await crawler.crawlSite(startUrl, { signal: deps.signal })
      : await crawler.crawlPaginated(startUrl, { signal: deps.signal });

  const sink = new ResultSink({ now: deps.now, logger: log });
  sink.add(summary.records);
  const outPath = await sink.serialize(cfg.outputDir, cfg.outputFormat);

  log.info(`records: ${sink.size}, visited: ${summary.visitedCount}, failed: ${summary.failedCount}`);
  log.info(`saved: ${outPath}`);
  return { summary, outPath };
}

export function helpText(): string {
  return [
    'Usage:',
    '  site-harvester crawl <url>      # Breadth-first crawl of a site, one record per page',
    '  site-harvester paginate <url>   # Follow pagination, extracting --select matches per page',
    'Flags:',
    '  --max-pages N  --delay MS  --retries N  --timeout MS  --concurrency N',
    '  --allow host[,host]  --exclude REGEX (repeatable)  --proxy --proxy-list url[,url]',
    '  --select SELECTOR  --next SELECTOR | --param NAME',
    '  --format json|csv  --out DIR',
    'Env:',
    '  DELAY_MS=1000 MAX_RETRIES=3 TIMEOUT_MS=10000 MAX_PAGES=100 CONCURRENCY=1',
    '  USE_PROXY=false PROXY_LIST=... ALLOWED_DOMAINS=... EXCLUDE_PATTERNS=...',
    '  DATA_SELECTOR=... NEXT_SELECTOR=... PAGE_PARAM=... OUTPUT_FORMAT=json OUTPUT_DIR=output LOG_LEVEL=info'
  ].join('\n');
}
