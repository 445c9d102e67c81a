import fs from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';

function* withNewlines(lines: Iterable<string>): Generator<string> {
  for (const line of lines) yield line + '\n';
}

export async function ensureDir(dir: string) {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function writeJson(filePath: string, data: unknown) {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export async function writeLines(filePath: string, lines: Iterable<string>) {
  await ensureDir(path.dirname(filePath));
  const source = Readable.from(withNewlines(lines));
  const fileStream = fs.createWriteStream(filePath, { encoding: 'utf8' });
  await new Promise<void>((resolve, reject) => {
    source.on('error', reject);
    fileStream.on('error', reject);
    fileStream.on('finish', () => resolve());
    source.pipe(fileStream);
  });
}

export function readJson(filePath: string, fallback: unknown): unknown {
  try {
    const raw = fs.readFileSync(filePath, 'utf-8');
    return JSON.parse(raw);
  } catch {
    return fallback;
  }
}
