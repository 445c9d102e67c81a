import path from 'node:path';
import { ConfigurationError } from './errors.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ensureDir, writeJson, writeLines } from './storage.js';
import type { CrawlRecord, OutputFormat, Page } from './types.js';
import { fileTimestamp } from './utils.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv'];

export function parseOutputFormat(input: string): OutputFormat {
  const format = input.trim().toLowerCase();
  const match = OUTPUT_FORMATS.find((f) => f === format);
  if (!match) {
    throw new ConfigurationError(`unsupported output format "${input}" (expected ${OUTPUT_FORMATS.join(' or ')})`);
  }
  return match;
}

type CsvValue = string | number | null | undefined;
type CsvRow = Record<string, CsvValue>;

export function csvEscape(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  let s = String(value);
  const needsQuotes = /[",\n\r]/.test(s);
  if (needsQuotes) {
    s = '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

function pageJson(page: Page) {
  return {
    url: page.url,
    title: page.title ?? null,
    text: page.text,
    links: page.links,
    images: page.images,
    meta: page.meta,
    status_code: page.statusCode,
    headers: page.headers
  };
}

export function toJson(records: readonly CrawlRecord[]) {
  return records.map((r) => {
    switch (r.kind) {
      case 'page':
        return pageJson(r.page);
      case 'paginated':
        return {
          current_url: r.url,
          data: r.data.map((e) => ({ html: e.html, text: e.text, attributes: e.attributes }))
        };
    }
  });
}

export function toCsvRows(records: readonly CrawlRecord[]): CsvRow[] {
  const rows: CsvRow[] = [];
  for (const r of records) {
    switch (r.kind) {
      case 'page':
        rows.push({
          url: r.page.url,
          title: r.page.title,
          status_code: r.page.statusCode,
          num_links: r.page.links.length,
          num_images: r.page.images.length
        });
        break;
      case 'paginated':
        for (const el of r.data) {
          rows.push({
            URL: r.url,
            'Text Content': el.text,
            'HTML Content': el.html,
            ...el.attributes
          });
        }
        break;
    }
  }
  return rows;
}

// Union of row keys in first-seen order.
export function csvColumns(rows: readonly CsvRow[]): string[] {
  const cols = new Set<string>();
  for (const row of rows) for (const k of Object.keys(row)) cols.add(k);
  return [...cols];
}

export function* csvLines(rows: readonly CsvRow[]): Generator<string> {
  const cols = csvColumns(rows);
  if (cols.length === 0) return;
  yield cols.map(csvEscape).join(',');
  for (const row of rows) yield cols.map((c) => csvEscape(row[c])).join(',');
}

export type SinkOptions = {
  now?: () => Date;
  logger?: Logger;
};

/** Writes `records` into `dir` and returns the path of the new file. The format is checked before any I/O. */
export async function serializeRecords(
  records: readonly CrawlRecord[],
  dir: string,
  requested: string,
  opts: SinkOptions = {}
): Promise<string> {
  const format = parseOutputFormat(requested);
  const now = opts.now ?? (() => new Date());
  const log = opts.logger ?? silentLogger;

  await ensureDir(dir);
  const outPath = path.join(dir, `crawl_results_${fileTimestamp(now())}.${format}`);
  switch (format) {
    case 'json':
      await writeJson(outPath, toJson(records));
      break;
    case 'csv':
      await writeLines(outPath, csvLines(toCsvRows(records)));
      break;
  }
  log.info(`results saved to ${outPath}`, { records: records.length, format });
  return outPath;
}

export class ResultSink {
  private items: CrawlRecord[] = [];

  constructor(private opts: SinkOptions = {}) {}

  get records(): readonly CrawlRecord[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  add(records: Iterable<CrawlRecord>) {
    for (const r of records) this.items.push(r);
  }

  serialize(dir: string, format: OutputFormat): Promise<string> {
    return serializeRecords(this.items, dir, format, this.opts);
  }
}
