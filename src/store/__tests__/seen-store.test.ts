import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadSeen, saveSeen } from '../seen-store.js';
import type { SeenStore, StoreFs } from '../seen-store.js';

let dir: string;
let path: string;

const realFs: StoreFs = {
  readFile: (p, encoding) => fs.readFile(p, encoding),
  writeFile: (p, data, encoding) => fs.writeFile(p, data, encoding),
  rename: (from, to) => fs.rename(from, to),
  mkdir: (p, options) => fs.mkdir(p, options),
};

const store: SeenStore = {
  abc123: { title: 'Housing Manager', first_seen: 1792324800, uri: 'https://example.test/job/1/apply' },
};

beforeEach(async () => {
  dir = await fs.mkdtemp(join(tmpdir(), 'seen-store-'));
  path = join(dir, 'seen.json');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('loadSeen', () => {
  it('returns an empty store when the file is missing', async () => {
    await expect(loadSeen(path)).resolves.toEqual({});
  });

  it('returns an empty store for invalid JSON', async () => {
    await fs.writeFile(path, '{"abc": {"title": "trunc', 'utf-8');
    await expect(loadSeen(path)).resolves.toEqual({});
  });

  it('returns an empty store when the JSON is not an object', async () => {
    await fs.writeFile(path, '["abc"]', 'utf-8');
    await expect(loadSeen(path)).resolves.toEqual({});
  });

  it('drops malformed entries and keeps the rest', async () => {
    await fs.writeFile(
      path,
      JSON.stringify({ good: { title: 'T', first_seen: 5, uri: 'u' }, bad: { title: 'T' } }),
      'utf-8',
    );
    await expect(loadSeen(path)).resolves.toEqual({ good: { title: 'T', first_seen: 5, uri: 'u' } });
  });

  it('reads an apply-link list as its first link', async () => {
    await fs.writeFile(
      path,
      JSON.stringify({ k: { title: 'T', first_seen: 5, uri: ['https://a.test/apply', 'https://b.test/apply'] } }),
      'utf-8',
    );
    await expect(loadSeen(path)).resolves.toEqual({ k: { title: 'T', first_seen: 5, uri: 'https://a.test/apply' } });
  });
});

describe('saveSeen', () => {
  it('writes a store that loads back unchanged', async () => {
    await saveSeen(path, store);
    await expect(loadSeen(path)).resolves.toEqual(store);
  });

  it('writes indented JSON and leaves no temp file behind', async () => {
    await saveSeen(path, store);
    expect(await fs.readFile(path, 'utf-8')).toBe(`${JSON.stringify(store, null, 2)}\n`);
    await expect(fs.access(`${path}.tmp`)).rejects.toThrow();
  });

  it('creates the parent directory', async () => {
    const nested = join(dir, 'state', 'seen.json');
    await saveSeen(nested, store);
    await expect(loadSeen(nested)).resolves.toEqual(store);
  });

  it('keeps the previous file intact when the write stops before the rename', async () => {
    await saveSeen(path, store);
    const before = await fs.readFile(path, 'utf-8');

    const crashing: StoreFs = {
      ...realFs,
      rename: () => Promise.reject(new Error('killed before rename')),
    };
    const next: SeenStore = { ...store, def456: { title: 'Building Manager', first_seen: 1792324900, uri: '' } };

    await expect(saveSeen(path, next, crashing)).rejects.toThrow('killed before rename');
    expect(await fs.readFile(path, 'utf-8')).toBe(before);
    await expect(loadSeen(path)).resolves.toEqual(store);
  });
});
