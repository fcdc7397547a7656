import { CacheEntry } from './types';

/**
 * Last known cursor position per file. Saves carry no position of their own,
 * so they read it from here. Entries never expire.
 *
 * Methods are synchronous, which keeps every access atomic with respect to
 * other notification handlers on the event loop.
 */
export class FileActivityCache {
  private entries: Map<string, CacheEntry> = new Map();

  record(path: string, line: number, column: number): void {
    this.entries.set(path, { line, column });
  }

  lookup(path: string): CacheEntry | undefined {
    const entry = this.entries.get(path);
    return entry ? { ...entry } : undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}
