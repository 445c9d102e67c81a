import { ConfigurationError, errorMessage } from './errors.js';
import { PageFetcher, assertSelector } from './fetcher.js';
import { Frontier } from './frontier.js';
import { HttpClient } from './http.js';
import type { Transport } from './http.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createPagination, nextPage } from './pagination.js';
import type { PaginationStrategy } from './pagination.js';
import { DEFAULT_EXCLUDE_PATTERNS, compileScope } from './scope.js';
import type { CrawlConfig, CrawlScope, CrawlSummary, PageRecord, PaginatedRecord } from './types.js';
import { canonicalUrl, sleep } from './utils.js';
import type { Sleep } from './utils.js';

export type CrawlerDeps = {
  logger?: Logger;
  transport?: Transport;
  random?: () => number;
  sleep?: Sleep;
  userAgents?: string[];
};

export type RunOptions = {
  signal?: AbortSignal;
};

export type CrawlerSettings = Pick<CrawlConfig, 'delayMs' | 'maxRetries' | 'timeoutMs' | 'maxPages'> &
  Partial<Pick<CrawlConfig, 'useProxy' | 'proxyList' | 'allowedDomains' | 'excludePatterns' | 'dataSelector' | 'pagination' | 'concurrency'>>;

export class Crawler {
  readonly http: HttpClient;
  readonly fetcher: PageFetcher;
  private cfg: CrawlerSettings;
  private log: Logger;
  private sleep: Sleep;
  private concurrency: number;

  constructor(cfg: CrawlerSettings, deps: CrawlerDeps = {}) {
    if (!Number.isInteger(cfg.maxPages) || cfg.maxPages < 1) {
      throw new ConfigurationError(`maxPages must be an integer >= 1, got ${cfg.maxPages}`);
    }
    if (!Number.isInteger(cfg.maxRetries) || cfg.maxRetries < 1) {
      throw new ConfigurationError(`maxRetries must be an integer >= 1, got ${cfg.maxRetries}`);
    }
    this.cfg = cfg;
    this.log = deps.logger ?? silentLogger;
    this.sleep = deps.sleep ?? sleep;
    this.concurrency = Math.max(1, cfg.concurrency ?? 1);

    this.http = new HttpClient({
      maxRetries: cfg.maxRetries,
      retryDelayMs: cfg.delayMs,
      timeoutMs: cfg.timeoutMs,
      proxies: cfg.useProxy ? cfg.proxyList ?? [] : [],
      concurrency: this.concurrency,
      userAgents: deps.userAgents,
      transport: deps.transport,
      random: deps.random,
      sleep: this.sleep,
      logger: this.log.child('http')
    });
    this.fetcher = new PageFetcher(this.http, { logger: this.log.child('fetch') });
  }

  private scopeFor(startUrl: string, defaultExcludes?: readonly string[]): CrawlScope {
    return compileScope({
      startUrl,
      allowedDomains: this.cfg.allowedDomains,
      excludePatterns: this.cfg.excludePatterns ?? defaultExcludes
    });
  }

  /**
   * Breadth-first crawl from `startUrl`. Up to `concurrency` fetches run at a
   * time, all dispatched from this one loop, which is the only code touching
   * the frontier. A page that cannot be fetched or parsed is dropped and the
   * crawl moves on.
   */
  async crawlSite(startUrl: string, opts: RunOptions = {}): Promise<CrawlSummary> {
    const log = this.log.child('site');
    const frontier = new Frontier(startUrl, this.cfg.maxPages, this.scopeFor(startUrl, DEFAULT_EXCLUDE_PATTERNS));
    const running = new Set<Promise<void>>();

    while (!opts.signal?.aborted) {
      const next = frontier.take();
      if (next.status === 'done') break;
      if (next.status === 'rejected') {
        log.debug(`skip (${next.reason}): ${next.url}`);
        continue;
      }
      if (next.status === 'idle' || next.status === 'budget') {
        if (running.size === 0) break;
        await Promise.race(running);
        continue;
      }

      const task: Promise<void> = this.visit(frontier, next.url, log).finally(() => {
        running.delete(task);
      });
      running.add(task);
      if (running.size >= this.concurrency) await Promise.race(running);
    }

    if (opts.signal?.aborted) log.warn('aborted; waiting for in-flight fetches');
    await Promise.all(running);

    log.info(`visited: ${frontier.visitedCount}, failed: ${frontier.failedCount}, pending: ${frontier.pendingCount}`);
    return {
      visitedCount: frontier.visitedCount,
      failedCount: frontier.failedCount,
      records: frontier.collected.map((page): PageRecord => ({ kind: 'page', page }))
    };
  }

  private async visit(frontier: Frontier, url: string, log: Logger) {
    log.info(`crawling: ${url}`);
    try {
      const res = await this.fetcher.fetch(url);
      if (res.status === 'ok') {
        if (!frontier.complete(url, res.page)) log.debug(`budget spent, discarding ${url}`);
      } else {
        frontier.fail(url);
        log.warn(`dropped (${res.status}): ${url}`, { error: res.error });
      }
    } catch (err) {
      frontier.fail(url);
      log.error(`dropped: ${url}`, { error: errorMessage(err) });
    }
    await this.sleep(this.cfg.delayMs);
  }

  /**
   * Collects `dataSelector` matches page after page. Stops on a failed fetch,
   * a page with no matches, the page budget, or when pagination yields no
   * in-scope URL that has not been collected already.
   */
  async crawlPaginated(startUrl: string, opts: RunOptions = {}): Promise<CrawlSummary> {
    const log = this.log.child('paginate');
    const dataSelector = this.cfg.dataSelector;
    if (!dataSelector) throw new ConfigurationError('a data selector is required for a paginated crawl');
    assertSelector(dataSelector, 'data selector');
    const strategy: PaginationStrategy | null = this.cfg.pagination
      ? createPagination(this.cfg.pagination, startUrl)
      : null;
    // no default exclusions here: next links often carry a fragment
    const scope = this.scopeFor(startUrl, []);

    const records: PaginatedRecord[] = [];
    const seen = new Set<string>();
    let failed = 0;
    let current = startUrl;

    while (!opts.signal?.aborted) {
      seen.add(canonicalUrl(current));
      const res = await this.fetcher.extract(current, dataSelector);
      if (res.status !== 'ok') {
        failed++;
        log.warn(`stopping, fetch failed (${res.status}): ${current}`, { error: res.error });
        break;
      }

      const data = res.data;
      if (data.length === 0) {
        log.warn(`stopping, no data found with selector ${dataSelector}: ${current}`);
        break;
      }
      records.push({ kind: 'paginated', url: current, data });
      log.info(`page ${records.length} collected: ${current} (${data.length} items)`);

      if (records.length >= this.cfg.maxPages) {
        log.info('page budget reached');
        break;
      }
      if (!strategy) {
        log.info('no pagination configured; stopping');
        break;
      }

      const step = nextPage(strategy, { url: current, html: res.html }, scope);
      if ('stop' in step) {
        log.info(`stopping: ${step.stop}`);
        break;
      }
      if (seen.has(canonicalUrl(step.next))) {
        log.info(`stopping: next page already collected: ${step.next}`);
        break;
      }

      await this.sleep(this.cfg.delayMs);
      current = step.next;
    }

    return { visitedCount: records.length, failedCount: failed, records };
  }
}
