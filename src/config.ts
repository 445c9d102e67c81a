import path from 'node:path';
import { ConfigurationError } from './errors.js';
import { parseOutputFormat } from './sink.js';
import type { CrawlConfig, PaginationConfig } from './types.js';
import { splitList } from './utils.js';

export type Command = 'crawl' | 'paginate' | 'help';

export type Env = Record<string, string | undefined>;

export type CliArgs = {
  command: Command;
  url?: string;
  flags: Map<string, string[]>;
};

const BOOLEAN_FLAGS = new Set(['proxy']);

const SHORT_FLAGS: Record<string, string> = {
  u: 'url',
  n: 'max-pages',
  f: 'format',
  o: 'out'
};

export function parseArgs(argv: readonly string[]): CliArgs {
  const flags = new Map<string, string[]>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const m = arg.match(/^--?([A-Za-z][\w-]*)(?:=(.*))?$/);
    if (!m) {
      positional.push(arg);
      continue;
    }
    const name = SHORT_FLAGS[m[1]] ?? m[1];
    let value: string | undefined = m[2];
    if (value === undefined) {
      if (BOOLEAN_FLAGS.has(name)) {
        value = 'true';
      } else {
        value = argv[i + 1];
        if (value === undefined) throw new ConfigurationError(`flag --${name} needs a value`);
        i++;
      }
    }
    flags.set(name, [...(flags.get(name) ?? []), value]);
  }

  const first = positional[0];
  const command: Command = first === 'crawl' || first === 'paginate' ? first : 'help';
  const url = flags.get('url')?.at(-1) ?? (command === 'help' ? undefined : positional[1]);
  return { command, url, flags };
}

function lastFlag(args: CliArgs, name: string): string | undefined {
  return args.flags.get(name)?.at(-1);
}

function readInt(label: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) throw new ConfigurationError(`${label} must be an integer, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < min) throw new ConfigurationError(`${label} must be >= ${min}, got ${n}`);
  return n;
}

function readBool(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true' || raw?.toLowerCase() === 'yes';
}

function readPagination(args: CliArgs, env: Env): PaginationConfig | undefined {
  const next = lastFlag(args, 'next') || env.NEXT_SELECTOR;
  const param = lastFlag(args, 'param') || env.PAGE_PARAM;
  if (next && param) {
    throw new ConfigurationError('next selector and page parameter are mutually exclusive; set only one');
  }
  if (next) return { kind: 'selector', selector: next };
  if (param) return { kind: 'parameter', param };
  return undefined;
}

/**
 * Merges CLI flags over environment variables. Every value is validated here,
 * so a bad setting fails before any request goes out.
 */
export function resolveConfig(args: CliArgs, env: Env = process.env): CrawlConfig {
  const defaultPages = args.command === 'paginate' ? 10 : 100;
  const flagList = (name: string) => args.flags.get(name)?.flatMap((v) => splitList(v)) ?? [];

  const allowed = flagList('allow');
  const excludeFlags = args.flags.get('exclude') ?? [];
  const excludeEnv = splitList(env.EXCLUDE_PATTERNS, /\s+/);
  const proxyList = [...flagList('proxy-list'), ...splitList(env.PROXY_LIST)];
  const useProxy = readBool(lastFlag(args, 'proxy') ?? env.USE_PROXY);
  if (useProxy && proxyList.length === 0) {
    throw new ConfigurationError('proxy use is enabled but PROXY_LIST is empty');
  }

  const allowedDomains = allowed.length ? allowed : splitList(env.ALLOWED_DOMAINS);
  const excludePatterns = excludeFlags.length ? excludeFlags : excludeEnv;

  return {
    delayMs: readInt('delay', lastFlag(args, 'delay') ?? env.DELAY_MS, 1000, 0),
    maxRetries: readInt('retries', lastFlag(args, 'retries') ?? env.MAX_RETRIES, 3, 1),
    timeoutMs: readInt('timeout', lastFlag(args, 'timeout') ?? env.TIMEOUT_MS, 10000, 1),
    useProxy,
    proxyList,
    maxPages: readInt('max pages', lastFlag(args, 'max-pages') ?? env.MAX_PAGES, defaultPages, 1),
    allowedDomains: allowedDomains.length ? allowedDomains : undefined,
    excludePatterns: excludePatterns.length ? excludePatterns : undefined,
    dataSelector: lastFlag(args, 'select') || env.DATA_SELECTOR || undefined,
    pagination: readPagination(args, env),
    outputFormat: parseOutputFormat(lastFlag(args, 'format') || env.OUTPUT_FORMAT || 'json'),
    outputDir: path.resolve(lastFlag(args, 'out') || env.OUTPUT_DIR || 'output'),
    concurrency: readInt('concurrency', lastFlag(args, 'concurrency') ?? env.CONCURRENCY, 1, 1)
  };
}

export function requireStartUrl(args: CliArgs): string {
  const raw = args.url;
  if (!raw) throw new ConfigurationError(`a start URL is required: site-harvester ${args.command} <url>`);
  try {
    const u = new URL(raw);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') throw new Error(`unsupported protocol ${u.protocol}`);
    return u.toString();
  } catch (err) {
    throw new ConfigurationError(`invalid start URL "${raw}"`, { cause: err });
  }
}
