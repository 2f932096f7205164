/**
 * Durable key/value storage used for credentials and the cached identity.
 * Values are opaque strings; writes are synchronous so a completed write is
 * visible to every later read.
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class MemoryStorage implements KeyValueStorage {
  private readonly values = new Map<string, string>();

  getItem(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.values.set(key, value);
  }

  removeItem(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }
}

/**
 * Keeps every entry in one JSON object on disk. The file is rewritten through
 * a temp file + rename on each change.
 */
export class JsonFileStorage implements KeyValueStorage {
  private cache: Record<string, string> | null = null;

  constructor(private readonly filePath: string) {}

  getItem(key: string): string | null {
    return this.load()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    const next = { ...this.load(), [key]: value };
    this.flush(next);
  }

  removeItem(key: string): void {
    const current = this.load();
    if (!(key in current)) return;
    const next = { ...current };
    delete next[key];
    this.flush(next);
  }

  private load(): Record<string, string> {
    if (this.cache) return this.cache;
    let parsed: unknown = {};
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (e) {
      // fs errors may belong to another realm; match on shape
      const code = typeof e === 'object' && e !== null && 'code' in e ? e.code : undefined;
      if (code !== 'ENOENT') {
        console.warn('Storage: could not read state file, starting empty', {
          file: this.filePath,
          error: typeof e === 'object' && e !== null && 'message' in e ? String(e.message) : String(e),
        });
      }
    }
    const entries: Record<string, string> = {};
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      for (const [k, v] of Object.entries(parsed)) {
        if (typeof v === 'string') entries[k] = v;
      }
    }
    this.cache = entries;
    return entries;
  }

  private flush(next: Record<string, string>): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(next, null, 2), { encoding: 'utf8', mode: 0o600 });
    renameSync(tmp, this.filePath);
    this.cache = next;
  }
}
