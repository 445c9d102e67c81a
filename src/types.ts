export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

export type HeaderMap = Record<string, string>;

export type FetchRequest = {
  readonly url: string;
  readonly method?: HttpMethod;
  readonly params?: ReadonlyArray<readonly [string, string]>; // appended to the query, keys unique
  readonly form?: Readonly<Record<string, string>>; // urlencoded body fields
  readonly headers?: Readonly<HeaderMap>; // merged over the generated identity headers
};

export type FetchOutcome =
  | { status: 'ok'; statusCode: number; headers: HeaderMap; body: string; url: string; attempts: number }
  | { status: 'exhausted'; attempts: number; error: string };

export type Page = {
  readonly url: string;
  readonly title?: string;
  readonly text: string;
  readonly links: readonly string[]; // absolute, document order
  readonly images: readonly string[];
  readonly meta: Readonly<Record<string, string>>;
  readonly statusCode: number;
  readonly headers: Readonly<HeaderMap>;
};

export type ExtractedElement = {
  html: string;
  text: string;
  attributes: Record<string, string>;
};

export type FetchPageResult =
  | { status: 'ok'; page: Page; html: string }
  | { status: 'transport_error'; url: string; attempts: number; error: string }
  | { status: 'parse_error'; url: string; error: string };

export type ExtractResult =
  | { status: 'ok'; url: string; data: ExtractedElement[]; html: string }
  | Exclude<FetchPageResult, { status: 'ok' }>;

export type CrawlScope = {
  allowedDomains: readonly string[];
  excludePatterns: readonly RegExp[];
};

export type PaginationConfig =
  | { kind: 'selector'; selector: string }
  | { kind: 'parameter'; param: string };

export type PageRecord = { kind: 'page'; page: Page };

export type PaginatedRecord = {
  kind: 'paginated';
  url: string;
  data: ExtractedElement[];
};

export type CrawlRecord = PageRecord | PaginatedRecord;

export type OutputFormat = 'json' | 'csv';

export type CrawlConfig = {
  delayMs: number; // politeness delay, also the retry backoff base
  maxRetries: number;
  timeoutMs: number;
  useProxy: boolean;
  proxyList: string[];
  maxPages: number;
  allowedDomains?: string[]; // defaults to the start URL's host
  excludePatterns?: string[]; // regex sources, defaults to DEFAULT_EXCLUDE_PATTERNS
  dataSelector?: string;
  pagination?: PaginationConfig;
  outputFormat: OutputFormat;
  outputDir: string;
  concurrency: number;
};

export type CrawlSummary = {
  visitedCount: number;
  failedCount: number;
  records: CrawlRecord[];
};
