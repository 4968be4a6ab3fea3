import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { errorMessage } from '../ingestion/errors.js';

const log = logger.child({ module: 'store:seen' });

const seenEntrySchema = z.object({
  title: z.string().nullish().transform(v => v ?? ''),
  first_seen: z.number(),
  // Older state files stored the whole apply-link list
  uri: z
    .union([z.string(), z.array(z.string()), z.null()])
    .optional()
    .transform(v => (Array.isArray(v) ? (v[0] ?? '') : (v ?? ''))),
});

export type SeenEntry = z.output<typeof seenEntrySchema>;

/** fingerprint → when and what was first announced */
export type SeenStore = Readonly<Record<string, SeenEntry>>;

export interface StoreFs {
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  writeFile(path: string, data: string, encoding: 'utf-8'): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(path: string, options: { recursive: true }): Promise<string | undefined>;
}

const nodeFs: StoreFs = {
  readFile: (path, encoding) => fs.readFile(path, encoding),
  writeFile: (path, data, encoding) => fs.writeFile(path, data, encoding),
  rename: (from, to) => fs.rename(from, to),
  mkdir: (path, options) => fs.mkdir(path, options),
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Missing or unreadable state loads as an empty store; invalid entries are dropped. */
export async function loadSeen(path: string, io: StoreFs = nodeFs): Promise<SeenStore> {
  let raw: string;
  try {
    raw = await io.readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      log.debug({ path }, 'No seen store yet');
    } else {
      log.warn({ path, err: errorMessage(err) }, 'Seen store unreadable; starting empty');
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn({ path, err: errorMessage(err) }, 'Seen store is not valid JSON; starting empty');
    return {};
  }

  const shape = z.record(z.unknown()).safeParse(parsed);
  if (!shape.success) {
    log.warn({ path }, 'Seen store is not a JSON object; starting empty');
    return {};
  }

  const store: Record<string, SeenEntry> = {};
  let dropped = 0;
  for (const [key, value] of Object.entries(shape.data)) {
    const entry = seenEntrySchema.safeParse(value);
    if (entry.success) {
      store[key] = entry.data;
    } else {
      dropped++;
    }
  }

  if (dropped > 0) {
    log.warn({ path, dropped }, 'Dropped malformed seen entries');
  }
  log.debug({ path, entries: Object.keys(store).length }, 'Seen store loaded');
  return store;
}

/**
 * Writes beside the target then renames over it, so a crash leaves either
 * the previous file or the new one, never a partial write.
 */
export async function saveSeen(path: string, store: SeenStore, io: StoreFs = nodeFs): Promise<void> {
  const tmp = `${path}.tmp`;
  await io.mkdir(dirname(path), { recursive: true });
  await io.writeFile(tmp, `${JSON.stringify(store, null, 2)}\n`, 'utf-8');
  await io.rename(tmp, path);
  log.debug({ path, entries: Object.keys(store).length }, 'Seen store saved');
}
