import * as cheerio from 'cheerio';
import { ConfigurationError, ParseError, errorMessage } from './errors.js';
import type { HttpClient } from './http.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { ExtractResult, ExtractedElement, FetchPageResult, HeaderMap, Page } from './types.js';
import { ensureAbsoluteUrl, textClean } from './utils.js';

const MARKUP_TYPES = /html|xml|text\//i;

/** Throws ConfigurationError when cheerio cannot compile the selector. */
export function assertSelector(selector: string, label = 'selector') {
  if (!selector.trim()) throw new ConfigurationError(`${label} is empty`);
  try {
    cheerio.load('')(selector);
  } catch (err) {
    throw new ConfigurationError(`invalid ${label} "${selector}": ${errorMessage(err)}`, { cause: err });
  }
}

export function assertMarkup(headers: HeaderMap) {
  const type = headers['content-type'];
  if (type && !MARKUP_TYPES.test(type)) {
    throw new ParseError(`not a markup response (content-type: ${type})`);
  }
}

function resolveAll(baseUrl: string, values: (string | undefined)[]): string[] {
  const out: string[] = [];
  for (const v of values) {
    const abs = ensureAbsoluteUrl(baseUrl, v);
    if (abs) out.push(abs);
  }
  return out;
}

export function parsePage(url: string, html: string, statusCode: number, headers: HeaderMap): Page {
  const $ = cheerio.load(html);

  const titleEl = $('title').first();
  const title = titleEl.length ? textClean(titleEl.text()) : undefined;

  const links = resolveAll(url, $('a[href]').map((_, a) => $(a).attr('href')).get());
  const images = resolveAll(url, $('img[src]').map((_, img) => $(img).attr('src')).get());

  const meta = new Map<string, string>();
  $('meta').each((_, el) => {
    const node = $(el);
    const name = node.attr('name') ?? node.attr('property');
    if (!name) return;
    meta.set(name, node.attr('content') ?? '');
  });

  $('script, style, noscript, template').remove();
  const body = $('body');
  const text = textClean(body.length ? body.text() : $.root().text());

  return {
    url,
    title,
    text,
    links,
    images,
    meta: Object.fromEntries(meta),
    statusCode,
    headers
  };
}

export function extractElements(html: string, selector: string): ExtractedElement[] {
  const $ = cheerio.load(html);
  return $(selector)
    .toArray()
    .map((el) => {
      const node = $(el);
      return {
        html: $.html(node),
        text: textClean(node.text()),
        attributes: { ...(node.attr() ?? {}) }
      };
    });
}

type FetcherOptions = {
  logger?: Logger;
};

export class PageFetcher {
  private log: Logger;

  constructor(private http: HttpClient, opts: FetcherOptions = {}) {
    this.log = opts.logger ?? silentLogger;
  }

  /** Fetches and parses one page. A parse failure is reported apart from transport failure. */
  async fetch(url: string): Promise<FetchPageResult> {
    const outcome = await this.http.execute({ url });
    if (outcome.status !== 'ok') {
      return { status: 'transport_error', url, attempts: outcome.attempts, error: outcome.error };
    }

    try {
      assertMarkup(outcome.headers);
      const page = parsePage(url, outcome.body, outcome.statusCode, outcome.headers);
      return { status: 'ok', page, html: outcome.body };
    } catch (err) {
      const error = errorMessage(err);
      this.log.error(`parse failed: ${url}`, { error });
      return { status: 'parse_error', url, error };
    }
  }

  /** Fetches `url` and returns the elements matching `selector`, with the raw markup. */
  async extract(url: string, selector: string): Promise<ExtractResult> {
    const res = await this.fetch(url);
    if (res.status !== 'ok') return res;
    return { status: 'ok', url, data: extractElements(res.html, selector), html: res.html };
  }
}
