import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileCacheStore } from '../cache/file-store.js';
import { CacheIoError } from '../cache/store.js';

const KEY = '900150983cd24fb0d6963f7d28e17f72';
const records = [{ name: 'Oil filter', price: 1350, rating: 4.2, link: 'https://example.test/a' }];

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'partscout-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing entry', async () => {
    await expect(new FileCacheStore({ dir }).get(KEY)).resolves.toBeNull();
  });

  it('writes one json file per key and reads it back', async () => {
    const store = new FileCacheStore({ dir: path.join(dir, 'nested') });
    await store.put(KEY, records);

    expect(store.filePathFor(KEY)).toBe(path.join(dir, 'nested', `${KEY}.json`));
    expect(JSON.parse(await readFile(store.filePathFor(KEY), 'utf8'))).toEqual(records);
    await expect(store.get(KEY)).resolves.toEqual(records);
  });

  it('survives a new store instance on the same directory', async () => {
    await new FileCacheStore({ dir }).put(KEY, records);
    await expect(new FileCacheStore({ dir }).get(KEY)).resolves.toEqual(records);
  });

  it('rejects corrupt entries with CacheIoError', async () => {
    const store = new FileCacheStore({ dir });
    await writeFile(store.filePathFor(KEY), '{ truncated', 'utf8');

    await expect(store.get(KEY)).rejects.toBeInstanceOf(CacheIoError);
  });

  it('rejects entries of the wrong shape', async () => {
    const store = new FileCacheStore({ dir });
    await writeFile(store.filePathFor(KEY), JSON.stringify([{ name: 'x' }]), 'utf8');

    await expect(store.get(KEY)).rejects.toThrow(
      `Cache get failed for ${KEY}: unexpected entry shape`
    );
  });
});
