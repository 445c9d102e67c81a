import { describe, it, expect } from 'vitest';
import { Crawler } from '../crawler.js';
import type { Transport } from '../http.js';
import type { CrawlRecord } from '../types.js';
import { fakeSite, linksPage, recordingSleep } from './helpers.js';

const settings = { delayMs: 10, maxRetries: 2, timeoutMs: 1000 };

function urls(records: CrawlRecord[]): string[] {
  return records.map((r) => (r.kind === 'page' ? r.page.url : r.url));
}

describe('Crawler.crawlSite', () => {
  it('collects exactly maxPages pages when the start page links to itself and five others', async () => {
    const others = [1, 2, 3, 4, 5].map((n) => `http://example.com/p${n}`);
    const { transport, calls } = fakeSite({
      'http://example.com/': { body: linksPage('home', ['/', ...others]) },
      ...Object.fromEntries(others.map((u) => [u, { body: linksPage(u, []) }]))
    });
    const crawler = new Crawler({ ...settings, maxPages: 3 }, { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] });

    const summary = await crawler.crawlSite('http://example.com/');

    expect(urls(summary.records)).toEqual(['http://example.com/', 'http://example.com/p1', 'http://example.com/p2']);
    expect(summary.visitedCount).toBe(3);
    expect(calls).toHaveLength(3);
  });

  it('never visits a page twice on a cyclic graph', async () => {
    const { transport, calls } = fakeSite({
      'http://example.com/a': { body: linksPage('a', ['/b', '/c', '/a']) },
      'http://example.com/b': { body: linksPage('b', ['/a', '/c']) },
      'http://example.com/c': { body: linksPage('c', ['/a', '/b', 'http://example.com/c']) }
    });
    const crawler = new Crawler({ ...settings, maxPages: 50 }, { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] });

    const summary = await crawler.crawlSite('http://example.com/a');

    const seen = urls(summary.records);
    expect(seen).toEqual(['http://example.com/a', 'http://example.com/b', 'http://example.com/c']);
    expect(new Set(seen).size).toBe(seen.length);
    expect(calls).toHaveLength(3);
  });

  it('drops an unreachable page and keeps crawling', async () => {
    const { transport, calls } = fakeSite({
      'http://example.com/': { body: linksPage('home', ['/bad', '/good']) },
      'http://example.com/bad': { status: 500 },
      'http://example.com/good': { body: linksPage('good', ['/bad']) }
    });
    const { sleep, delays } = recordingSleep();
    const crawler = new Crawler({ ...settings, maxPages: 10 }, { transport, sleep, userAgents: ['ua'] });

    const summary = await crawler.crawlSite('http://example.com/');

    expect(urls(summary.records)).toEqual(['http://example.com/', 'http://example.com/good']);
    expect(summary.failedCount).toBe(1);
    // /bad is tried maxRetries times and not queued again when /good links to it
    expect(calls.map((c) => c.url)).toEqual([
      'http://example.com/',
      'http://example.com/bad',
      'http://example.com/bad',
      'http://example.com/good'
    ]);
    // three politeness pauses plus one backoff
    expect(delays).toEqual([10, 10, 10, 10]);
  });

  it('skips links outside the allowed domains and excluded resources', async () => {
    const { transport, calls } = fakeSite({
      'http://example.com/': {
        body: linksPage('home', ['http://other.com/x', '/report.pdf', '/style.css', '/page#top', '/ok'])
      },
      'http://example.com/ok': { body: linksPage('ok', []) }
    });
    const crawler = new Crawler({ ...settings, maxPages: 10 }, { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] });

    const summary = await crawler.crawlSite('http://example.com/');

    expect(calls.map((c) => c.url)).toEqual(['http://example.com/', 'http://example.com/ok']);
    expect(summary.records).toHaveLength(2);
  });

  it('follows allow-listed subdomains when configured', async () => {
    const { transport, calls } = fakeSite({
      'http://example.com/': { body: linksPage('home', ['http://docs.example.com/intro']) },
      'http://docs.example.com/intro': { body: linksPage('intro', []) }
    });
    const crawler = new Crawler(
      { ...settings, maxPages: 10, allowedDomains: ['example.com'] },
      { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] }
    );

    await crawler.crawlSite('http://example.com/');

    expect(calls.map((c) => c.url)).toEqual(['http://example.com/', 'http://docs.example.com/intro']);
  });

  it('stops dispatching once aborted and keeps what it has', async () => {
    const controller = new AbortController();
    const site = fakeSite({
      'http://example.com/': { body: linksPage('home', ['/a', '/b']) },
      'http://example.com/a': { body: linksPage('a', []) }
    });
    const transport: Transport = async (req) => {
      const res = await site.transport(req);
      controller.abort();
      return res;
    };
    const crawler = new Crawler({ ...settings, maxPages: 10 }, { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] });

    const summary = await crawler.crawlSite('http://example.com/', { signal: controller.signal });

    expect(site.calls).toHaveLength(1);
    expect(urls(summary.records)).toEqual(['http://example.com/']);
  });

  it('never exceeds the budget with several fetches in flight', async () => {
    const children = [1, 2, 3, 4, 5, 6].map((n) => `http://example.com/c${n}`);
    const { transport, calls } = fakeSite({
      'http://example.com/': { body: linksPage('home', children) },
      ...Object.fromEntries(children.map((u) => [u, { body: linksPage(u, ['/']) }]))
    });
    const crawler = new Crawler(
      { ...settings, maxPages: 3, concurrency: 4 },
      { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] }
    );

    const summary = await crawler.crawlSite('http://example.com/');

    expect(summary.records).toHaveLength(3);
    expect(calls).toHaveLength(3);
    expect(new Set(urls(summary.records)).size).toBe(3);
  });

  it('fetches in parallel up to the concurrency limit', async () => {
    const children = [1, 2, 3].map((n) => `http://example.com/c${n}`);
    const site = fakeSite({
      'http://example.com/': { body: linksPage('home', children) },
      ...Object.fromEntries(children.map((u) => [u, { body: linksPage(u, []) }]))
    });
    let active = 0;
    let peak = 0;
    const transport: Transport = async (req) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
      return site.transport(req);
    };
    const crawler = new Crawler(
      { ...settings, maxPages: 10, concurrency: 3 },
      { transport, sleep: recordingSleep().sleep, userAgents: ['ua'] }
    );

    const summary = await crawler.crawlSite('http://example.com/');

    expect(summary.records).toHaveLength(4);
    expect(peak).toBe(3);
  });
});
