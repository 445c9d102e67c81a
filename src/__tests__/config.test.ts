import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { parseArgs, requireStartUrl, resolveConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('parseArgs', () => {
  it('reads the command, the URL and repeated flags', () => {
    const args = parseArgs(['crawl', 'https://example.com/', '--max-pages', '5', '--exclude', '\\.pdf$', '--exclude=#', '--proxy']);

    expect(args.command).toBe('crawl');
    expect(args.url).toBe('https://example.com/');
    expect(args.flags.get('max-pages')).toEqual(['5']);
    expect(args.flags.get('exclude')).toEqual(['\\.pdf$', '#']);
    expect(args.flags.get('proxy')).toEqual(['true']);
  });

  it('maps short flags and prefers --url over a positional', () => {
    const args = parseArgs(['paginate', 'https://a.example/', '-u', 'https://b.example/', '-n', '2']);
    expect(args.url).toBe('https://b.example/');
    expect(args.flags.get('max-pages')).toEqual(['2']);
  });

  it('falls back to help for unknown commands', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['scrape']).command).toBe('help');
  });

  it('requires a value for value flags', () => {
    expect(() => parseArgs(['crawl', 'https://example.com/', '--format'])).toThrow(ConfigurationError);
  });
});

describe('resolveConfig', () => {
  it('applies defaults when nothing is set', () => {
    const cfg = resolveConfig(parseArgs(['crawl', 'https://example.com/']), {});

    expect(cfg).toEqual({
      delayMs: 1000,
      maxRetries: 3,
      timeoutMs: 10000,
      useProxy: false,
      proxyList: [],
      maxPages: 100,
      allowedDomains: undefined,
      excludePatterns: undefined,
      dataSelector: undefined,
      pagination: undefined,
      outputFormat: 'json',
      outputDir: path.resolve('output'),
      concurrency: 1
    });
  });

  it('uses a smaller page budget for paginated crawls', () => {
    expect(resolveConfig(parseArgs(['paginate', 'https://example.com/']), {}).maxPages).toBe(10);
  });

  it('reads the environment and lets flags win', () => {
    const env = {
      DELAY_MS: '250',
      MAX_PAGES: '40',
      ALLOWED_DOMAINS: 'example.com, example.org',
      EXCLUDE_PATTERNS: '\\.zip$ /private/',
      PAGE_PARAM: 'p',
      DATA_SELECTOR: '.comment',
      OUTPUT_FORMAT: 'csv',
      USE_PROXY: 'true',
      PROXY_LIST: 'http://proxy-a:3128,http://proxy-b:3128'
    };
    const cfg = resolveConfig(parseArgs(['paginate', 'https://example.com/', '--max-pages', '7']), env);

    expect(cfg.delayMs).toBe(250);
    expect(cfg.maxPages).toBe(7);
    expect(cfg.allowedDomains).toEqual(['example.com', 'example.org']);
    expect(cfg.excludePatterns).toEqual(['\\.zip$', '/private/']);
    expect(cfg.pagination).toEqual({ kind: 'parameter', param: 'p' });
    expect(cfg.dataSelector).toBe('.comment');
    expect(cfg.outputFormat).toBe('csv');
    expect(cfg.useProxy).toBe(true);
    expect(cfg.proxyList).toEqual(['http://proxy-a:3128', 'http://proxy-b:3128']);
  });

  it('treats empty environment values as unset', () => {
    const env = { OUTPUT_FORMAT: '', OUTPUT_DIR: '', DATA_SELECTOR: '', NEXT_SELECTOR: '', PAGE_PARAM: '', MAX_PAGES: '' };
    const cfg = resolveConfig(parseArgs(['paginate', 'https://example.com/']), env);

    expect(cfg.outputFormat).toBe('json');
    expect(cfg.outputDir).toBe(path.resolve('output'));
    expect(cfg.dataSelector).toBeUndefined();
    expect(cfg.pagination).toBeUndefined();
    expect(cfg.maxPages).toBe(10);
  });

  it('rejects a next selector combined with a page parameter', () => {
    const args = parseArgs(['paginate', 'https://example.com/', '--next', 'a.next', '--param', 'page']);
    expect(() => resolveConfig(args, {})).toThrow(ConfigurationError);
  });

  it('rejects bad numbers', () => {
    expect(() => resolveConfig(parseArgs(['crawl', 'https://example.com/', '--max-pages', '0']), {})).toThrow(
      'max pages must be >= 1, got 0'
    );
    expect(() => resolveConfig(parseArgs(['crawl', 'https://example.com/']), { MAX_RETRIES: 'many' })).toThrow(
      'retries must be an integer, got "many"'
    );
  });

  it('rejects an unsupported format and proxying without proxies', () => {
    expect(() => resolveConfig(parseArgs(['crawl', 'https://example.com/', '--format', 'xml']), {})).toThrow(ConfigurationError);
    expect(() => resolveConfig(parseArgs(['crawl', 'https://example.com/', '--proxy']), {})).toThrow(
      'proxy use is enabled but PROXY_LIST is empty'
    );
  });
});

describe('requireStartUrl', () => {
  it('normalizes a valid http(s) URL', () => {
    expect(requireStartUrl(parseArgs(['crawl', 'https://Example.com']))).toBe('https://example.com/');
  });

  it('rejects missing and non-http URLs', () => {
    expect(() => requireStartUrl(parseArgs(['crawl']))).toThrow(ConfigurationError);
    expect(() => requireStartUrl(parseArgs(['crawl', 'ftp://example.com/']))).toThrow('invalid start URL "ftp://example.com/"');
  });
});
