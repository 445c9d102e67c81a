import * as cheerio from 'cheerio';
import { ConfigurationError } from './errors.js';
import { assertSelector } from './fetcher.js';
import { isInScope } from './scope.js';
import type { CrawlScope, PaginationConfig } from './types.js';
import { ensureAbsoluteUrl } from './utils.js';

export type PageContext = {
  url: string;
  html: string;
};

export type NextStep = { next: string } | { stop: 'no-next' | 'out-of-scope' };

export interface PaginationStrategy {
  readonly kind: PaginationConfig['kind'];
  /** Candidate for the page after `current`, before any scope check. */
  candidate(current: PageContext): string | null;
}

/** Follows the first element matching the "next" selector. Stateless. */
export class SelectorPagination implements PaginationStrategy {
  readonly kind = 'selector';

  constructor(readonly selector: string) {
    assertSelector(selector, 'next selector');
  }

  candidate(current: PageContext): string | null {
    const $ = cheerio.load(current.html);
    const href = $(this.selector).first().attr('href');
    return ensureAbsoluteUrl(current.url, href);
  }
}

const INTEGER = /^[+-]?\d+$/;

export function readPageNumber(url: string, param: string): number {
  const raw = parseQuery(new URL(url).search).get(param);
  if (raw === undefined) return 1;
  if (!INTEGER.test(raw.trim())) {
    throw new ConfigurationError(`page parameter "${param}" is not an integer: "${raw}"`);
  }
  return parseInt(raw, 10);
}

/** Ordered key→value view of a query string. Last occurrence wins, first position kept. */
export function parseQuery(search: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const [k, v] of new URLSearchParams(search)) out.set(k, v);
  return out;
}

export function setQueryParam(url: string, param: string, value: string): string {
  const u = new URL(url);
  const query = parseQuery(u.search);
  query.set(param, value);
  u.search = new URLSearchParams([...query]).toString();
  return u.toString();
}

/** Increments a numeric query parameter. Never stops on its own. */
export class ParameterPagination implements PaginationStrategy {
  readonly kind = 'parameter';
  private page: number | null = null;

  constructor(readonly param: string, startUrl?: string) {
    if (!param.trim()) throw new ConfigurationError('page parameter name is empty');
    if (startUrl) this.page = readPageNumber(startUrl, param);
  }

  get currentPage(): number | null {
    return this.page;
  }

  candidate(current: PageContext): string | null {
    const page = readPageNumber(current.url, this.param) + 1;
    this.page = page;
    return setQueryParam(current.url, this.param, String(page));
  }
}

export function createPagination(cfg: PaginationConfig, startUrl: string): PaginationStrategy {
  switch (cfg.kind) {
    case 'selector':
      return new SelectorPagination(cfg.selector);
    case 'parameter':
      return new ParameterPagination(cfg.param, startUrl);
  }
}

export function nextPage(strategy: PaginationStrategy, current: PageContext, scope: CrawlScope): NextStep {
  const candidate = strategy.candidate(current);
  if (!candidate) return { stop: 'no-next' };
  if (!isInScope(candidate, scope)) return { stop: 'out-of-scope' };
  return { next: candidate };
}
