import * as fs from 'fs/promises';

/** One URL per line; blank lines and `#` comments are skipped. */
export function parseUrlList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export function capUrls(urls: string[], maxUrls: number): string[] {
  return maxUrls > 0 ? urls.slice(0, maxUrls) : urls;
}

/** Reads the PDP input file; null when it does not exist. */
export async function readUrlFile(filePath: string): Promise<string[] | null> {
  try {
    return parseUrlList(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
