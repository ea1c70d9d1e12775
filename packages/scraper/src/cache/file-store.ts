import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { CachedListingRecord } from '@partscout/types';

import { parseCachedRecords } from './records.js';
import { CacheIoError, type CacheStore } from './store.js';

export const DEFAULT_CACHE_DIR = 'cache';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One `<dir>/<key>.json` file per entry holding a JSON array of
 * `{ name, price, rating, link }`. The directory is created on first write.
 */
export class FileCacheStore implements CacheStore {
  public readonly kind = 'file';
  public readonly dir: string;

  public constructor(options: { dir?: string } = {}) {
    this.dir = options.dir ?? DEFAULT_CACHE_DIR;
  }

  public filePathFor(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  public async get(key: string): Promise<readonly CachedListingRecord[] | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePathFor(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CacheIoError({ key, operation: 'get', cause: error });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new CacheIoError({ key, operation: 'get', cause: error });
    }

    const records = parseCachedRecords(payload);
    if (!records) {
      const cause = new Error('unexpected entry shape');
      throw new CacheIoError({ key, operation: 'get', cause });
    }
    return records;
  }

  public async put(key: string, records: readonly CachedListingRecord[]): Promise<void> {
    const target = this.filePathFor(key);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(records), 'utf8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch(() => undefined);
      throw new CacheIoError({ key, operation: 'put', cause: error });
    }
  }
}
