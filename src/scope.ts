import { ConfigurationError, errorMessage } from './errors.js';
import type { CrawlScope } from './types.js';
import { hostOf, safeUrl } from './utils.js';

/**
 * Applied when the caller supplies no exclusions: images, PDF and office
 * documents, stylesheets, scripts, and any URL carrying a fragment.
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '\\.(jpg|jpeg|png|gif|pdf|doc|docx|xls|xlsx)$',
  '\\.(css|js)$',
  '#.*$'
];

export type ScopeOptions = {
  startUrl: string;
  allowedDomains?: readonly string[];
  excludePatterns?: readonly string[];
};

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((p) => {
    try {
      return new RegExp(p);
    } catch (err) {
      throw new ConfigurationError(`invalid exclude pattern "${p}": ${errorMessage(err)}`, { cause: err });
    }
  });
}

export function compileScope(opts: ScopeOptions): CrawlScope {
  const allowed = opts.allowedDomains?.length ? [...opts.allowedDomains] : [hostOf(opts.startUrl)];
  if (allowed.some((d) => !d)) {
    throw new ConfigurationError(`cannot derive an allowed domain from ${opts.startUrl}`);
  }
  return {
    allowedDomains: allowed,
    excludePatterns: compilePatterns(opts.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS)
  };
}

export function isInScope(candidate: string, scope: CrawlScope): boolean {
  const u = safeUrl(candidate);
  if (!u) return false;
  if (!scope.allowedDomains.some((d) => u.host.includes(d))) return false;
  // patterns without the g flag keep no lastIndex state between calls
  return !scope.excludePatterns.some((re) => re.test(candidate));
}
