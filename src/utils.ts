export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

export function textClean(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function safeUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

// Canonical string form used for visited/pending bookkeeping.
export function canonicalUrl(input: string): string {
  return safeUrl(input)?.toString() ?? input;
}

export function hostOf(input: string): string {
  return safeUrl(input)?.host ?? '';
}

export function pick<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) return undefined;
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[idx];
}

export function splitList(input: string | undefined, separator: RegExp = /,/): string[] {
  if (!input) return [];
  return input
    .split(separator)
    .map((s) => s.trim())
    .filter(Boolean);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// YYYYMMDD_HHMMSS in local time
export function fileTimestamp(d: Date): string {
  const date = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `${date}_${time}`;
}
