import type { Transport, TransportRequest } from '../http.js';
import type { HeaderMap } from '../types.js';

export type FakeRoute = { status?: number; body?: string; headers?: HeaderMap } | Error;

/**
 * In-process stand-in for the network. Unknown URLs answer 404; an Error
 * route makes every request to it throw.
 */
export function fakeSite(routes: Record<string, FakeRoute>) {
  const calls: TransportRequest[] = [];
  const transport: Transport = async (req) => {
    calls.push(req);
    const route = routes[req.url];
    if (route instanceof Error) throw route;
    if (!route) {
      return { statusCode: 404, headers: { 'content-type': 'text/html' }, body: 'not found', url: req.url };
    }
    return {
      statusCode: route.status ?? 200,
      headers: { 'content-type': 'text/html; charset=utf-8', ...route.headers },
      body: route.body ?? '',
      url: req.url
    };
  };
  return { transport, calls };
}

export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

export function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

export function linksPage(title: string, hrefs: string[], extra = ''): string {
  const anchors = hrefs.map((h) => `<a href="${h}">${h}</a>`).join('');
  return `<html><head><title>${title}</title></head><body>${anchors}${extra}</body></html>`;
}
