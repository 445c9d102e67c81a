import got from 'got';
import { HttpProxyAgent, HttpsProxyAgent } from 'hpagent';
import pLimit from 'p-limit';
import { fileURLToPath } from 'node:url';
import { TransportError, errorMessage } from './errors.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { readJson } from './storage.js';
import type { FetchOutcome, FetchRequest, HeaderMap, HttpMethod } from './types.js';
import { pick, sleep } from './utils.js';
import type { Sleep } from './utils.js';

export type TransportRequest = {
  url: string;
  method: HttpMethod;
  headers: HeaderMap;
  form?: Record<string, string>;
  proxy?: string;
  timeoutMs: number;
};

export type TransportResponse = {
  statusCode: number;
  headers: HeaderMap;
  body: string;
  url: string;
};

/** Performs one HTTP request. Throws on network failure or timeout. */
export type Transport = (req: TransportRequest) => Promise<TransportResponse>;

export type HttpOptions = {
  maxRetries?: number;
  retryDelayMs?: number; // linear backoff base
  timeoutMs?: number;
  proxies?: string[]; // an empty list disables proxying
  concurrency?: number;
  userAgents?: string[];
  transport?: Transport;
  random?: () => number;
  sleep?: Sleep;
  logger?: Logger;
};

const HEADER_TEMPLATE: HeaderMap = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.8,zh-CN;q=0.6',
  connection: 'keep-alive',
  'upgrade-insecure-requests': '1'
};

const FALLBACK_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

let bundledAgents: string[] | null = null;

export function loadUserAgents(): string[] {
  if (bundledAgents) return bundledAgents;
  const file = fileURLToPath(new URL('../data/user-agents.json', import.meta.url));
  const raw = readJson(file, []);
  const list = Array.isArray(raw) ? raw.filter((ua): ua is string => typeof ua === 'string' && ua.length > 0) : [];
  bundledAgents = list.length ? list : [FALLBACK_USER_AGENT];
  return bundledAgents;
}

export function flattenHeaders(headers: Record<string, string | string[] | undefined>): HeaderMap {
  const out: HeaderMap = {};
  for (const [k, v] of Object.entries(headers)) {
    if (v === undefined) continue;
    out[k.toLowerCase()] = Array.isArray(v) ? v.join(', ') : v;
  }
  return out;
}

const client = got.extend({
  followRedirect: true,
  throwHttpErrors: false,
  retry: { limit: 0 }
});

const agentCache = new Map<string, { http: HttpProxyAgent; https: HttpsProxyAgent }>();

function proxyAgents(proxy: string) {
  let agents = agentCache.get(proxy);
  if (!agents) {
    agents = {
      http: new HttpProxyAgent({ keepAlive: true, proxy }),
      https: new HttpsProxyAgent({ keepAlive: true, proxy })
    };
    agentCache.set(proxy, agents);
  }
  return agents;
}

export const gotTransport: Transport = async (req) => {
  const res = await client(req.url, {
    method: req.method,
    headers: req.headers,
    form: req.form,
    agent: req.proxy ? proxyAgents(req.proxy) : undefined,
    timeout: { request: req.timeoutMs },
    responseType: 'text'
  });
  return {
    statusCode: res.statusCode,
    headers: flattenHeaders(res.headers),
    body: res.body,
    url: res.url
  };
};

export function withParams(url: string, params: FetchRequest['params']): string {
  if (!params || params.length === 0) return url;
  const u = new URL(url);
  for (const [k, v] of params) u.searchParams.set(k, v);
  return u.toString();
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

export class HttpClient {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number;

  private proxies: string[];
  private userAgents: string[];
  private transport: Transport;
  private random: () => number;
  private sleep: Sleep;
  private log: Logger;
  private limit: ReturnType<typeof pLimit>;

  constructor(opts: HttpOptions = {}) {
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
    this.retryDelayMs = Math.max(0, opts.retryDelayMs ?? 1000);
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? 10000);
    this.proxies = opts.proxies ?? [];
    this.userAgents = opts.userAgents?.length ? opts.userAgents : loadUserAgents();
    this.transport = opts.transport ?? gotTransport;
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? sleep;
    this.log = opts.logger ?? silentLogger;
    this.limit = pLimit(Math.max(1, opts.concurrency ?? 4));
  }

  identityHeaders(): HeaderMap {
    return {
      'user-agent': pick(this.userAgents, this.random) ?? FALLBACK_USER_AGENT,
      ...HEADER_TEMPLATE
    };
  }

  pickProxy(): string | undefined {
    return pick(this.proxies, this.random);
  }

  backoffDelay(attempt: number): number {
    return this.retryDelayMs * attempt;
  }

  /**
   * Runs the request with up to `maxRetries` attempts. Every attempt draws its
   * own identity headers and proxy. Backoff sleeps happen outside the
   * concurrency slot so they never hold up other requests.
   */
  async execute(req: FetchRequest): Promise<FetchOutcome> {
    const url = withParams(req.url, req.params);
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const res = await this.limit(() => this.attempt(url, req));
        return { status: 'ok', ...res, attempts: attempt };
      } catch (err) {
        lastError = errorMessage(err);
        this.log.warn(`request failed (attempt ${attempt}/${this.maxRetries}): ${url}`, { error: lastError });
        if (attempt < this.maxRetries) await this.sleep(this.backoffDelay(attempt));
      }
    }

    this.log.error(`max retries reached: ${url}`);
    return { status: 'exhausted', attempts: this.maxRetries, error: lastError };
  }

  private async attempt(url: string, req: FetchRequest): Promise<TransportResponse> {
    let res: TransportResponse;
    try {
      res = await this.transport({
        url,
        method: req.method ?? (req.form ? 'POST' : 'GET'),
        headers: { ...this.identityHeaders(), ...lowerKeys(req.headers) },
        form: req.form ? { ...req.form } : undefined,
        proxy: this.pickProxy(),
        timeoutMs: this.timeoutMs
      });
    } catch (err) {
      throw new TransportError(errorMessage(err), undefined, { cause: err });
    }
    if (!isSuccessStatus(res.statusCode)) {
      throw new TransportError(`HTTP ${res.statusCode}`, res.statusCode);
    }
    return res;
  }
}

function lowerKeys(headers: Readonly<HeaderMap> | undefined): HeaderMap {
  const out: HeaderMap = {};
  if (!headers) return out;
  for (const [k, v] of Object.entries(headers)) out[k.toLowerCase()] = v;
  return out;
}
