import { isInScope } from './scope.js';
import type { CrawlScope, Page } from './types.js';
import { canonicalUrl } from './utils.js';

export type TakeResult =
  | { status: 'url'; url: string }
  | { status: 'rejected'; url: string; reason: 'visited' | 'out-of-scope' }
  | { status: 'idle' } // nothing pending right now, fetches still in flight
  | { status: 'budget' } // remaining budget is reserved by in-flight fetches
  | { status: 'done' };

/**
 * Crawl state for one site crawl. Pending URLs are served first-in first-out.
 * A URL is never pending while visited, in flight or abandoned, and the page
 * budget is reserved when a URL is taken so `collected` cannot overshoot it.
 */
export class Frontier {
  private queue: string[] = [];
  private pending = new Set<string>();
  private visited = new Set<string>();
  private inFlight = new Set<string>();
  private abandoned = new Set<string>();
  private pages: Page[] = [];

  constructor(
    startUrl: string,
    readonly maxPages: number,
    private scope: CrawlScope
  ) {
    this.enqueue(startUrl);
  }

  get collected(): readonly Page[] {
    return this.pages;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get failedCount(): number {
    return this.abandoned.size;
  }

  get budgetReached(): boolean {
    return this.pages.length >= this.maxPages;
  }

  get done(): boolean {
    if (this.budgetReached) return true;
    return this.pending.size === 0 && this.inFlight.size === 0;
  }

  isVisited(url: string): boolean {
    return this.visited.has(canonicalUrl(url));
  }

  enqueue(url: string): boolean {
    const key = canonicalUrl(url);
    if (this.visited.has(key) || this.pending.has(key) || this.inFlight.has(key) || this.abandoned.has(key)) {
      return false;
    }
    this.pending.add(key);
    this.queue.push(key);
    return true;
  }

  take(): TakeResult {
    if (this.done) return { status: 'done' };
    if (this.pages.length + this.inFlight.size >= this.maxPages) return { status: 'budget' };

    const url = this.queue.shift();
    if (url === undefined) return { status: 'idle' };
    this.pending.delete(url);

    if (this.visited.has(url)) return { status: 'rejected', url, reason: 'visited' };
    if (!isInScope(url, this.scope)) return { status: 'rejected', url, reason: 'out-of-scope' };

    this.inFlight.add(url);
    return { status: 'url', url };
  }

  /** Records a fetched page and queues its outbound links. Returns false if the budget was already spent. */
  complete(url: string, page: Page): boolean {
    const key = canonicalUrl(url);
    this.inFlight.delete(key);
    if (this.budgetReached || this.visited.has(key)) return false;

    this.visited.add(key);
    this.pages.push(page);
    for (const link of page.links) this.enqueue(link);
    return true;
  }

  fail(url: string) {
    const key = canonicalUrl(url);
    this.inFlight.delete(key);
    this.abandoned.add(key);
  }
}
