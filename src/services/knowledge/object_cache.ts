import path from 'path';
import fs from 'fs-extra';
import logger from '../../utils/logger';
import { describeError } from './errors';

const log = logger.child({ module: 'Knowledge:Cache' });

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * On-disk copies of bucket objects, laid out under `dir` by object key.
 * Entries older than `ttlMs` are fetched again; a ttl of 0 keeps them forever.
 * The directory may be wiped at any time.
 */
export class ObjectCache {
  private readonly root: string;

  constructor(dir: string, private readonly ttlMs: number = DEFAULT_CACHE_TTL_MS) {
    this.root = path.resolve(dir);
  }

  get dir(): string {
    return this.root;
  }

  private pathFor(key: string): string | null {
    const target = path.resolve(this.root, key);
    return target.startsWith(this.root + path.sep) ? target : null;
  }

  private async freshCopy(target: string): Promise<Buffer | null> {
    try {
      const stat = await fs.stat(target);
      if (this.ttlMs > 0 && Date.now() - stat.mtimeMs >= this.ttlMs) return null;
      return await fs.readFile(target);
    } catch {
      return null;
    }
  }

  /**
   * Returns the cached bytes for `key`, downloading through `fetch` on a miss.
   * Resolves null when the object does not exist upstream.
   */
  async get(key: string, fetch: () => Promise<Buffer | null>): Promise<Buffer | null> {
    const target = this.pathFor(key);
    if (target) {
      const cached = await this.freshCopy(target);
      if (cached) return cached;
    }

    const data = await fetch();
    if (data === null || target === null) return data;

    try {
      await fs.outputFile(target, data);
    } catch (err) {
      // A failed cache write only costs a download next time
      log.warn({ key, error: describeError(err) }, 'Failed to cache object');
    }
    return data;
  }

  /** Drops every cached object whose key starts with `prefix`. */
  async evictPrefix(prefix: string): Promise<void> {
    const target = this.pathFor(prefix);
    if (!target) return;
    try {
      await fs.remove(target);
    } catch (err) {
      log.warn({ prefix, error: describeError(err) }, 'Failed to evict cached objects');
    }
  }
}
