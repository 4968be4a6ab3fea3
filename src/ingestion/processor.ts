import type { FilterRule } from '../config/run-config.js';
import type { SeenEntry, SeenStore } from '../store/seen-store.js';
import type { Posting } from './providers/base.js';
import { passesInclusionRule } from './filters.js';
import { postingFingerprint, readSearchResult, toPosting } from './normalizer.js';

export interface AcceptedPosting {
  fingerprint: string;
  posting: Posting;
}

export interface ProcessResult {
  totalCount: number;
  itemCount: number;
  accepted: AcceptedPosting[];
  insertions: Record<string, SeenEntry>;
  skippedSeen: number;
  skippedFiltered: number;
  skippedMalformed: number;
}

/**
 * Pure pass over one search response. `seen` is read, never written; the
 * entries to add come back as `insertions` for commitInsertions.
 *
 * Seen postings are skipped before the inclusion rule runs, so a later rule
 * change never re-announces them. Postings the rule rejects are not recorded
 * and are reconsidered on every run.
 */
export function processResults(raw: unknown, seen: SeenStore, rule: FilterRule, now: Date): ProcessResult {
  const { totalCount, items } = readSearchResult(raw);
  const firstSeen = Math.floor(now.getTime() / 1000);

  const result: ProcessResult = {
    totalCount,
    itemCount: items.length,
    accepted: [],
    insertions: {},
    skippedSeen: 0,
    skippedFiltered: 0,
    skippedMalformed: 0,
  };

  for (const item of items) {
    const posting = toPosting(item);
    if (!posting) {
      result.skippedMalformed++;
      continue;
    }

    const key = postingFingerprint(posting);
    if (Object.hasOwn(seen, key) || Object.hasOwn(result.insertions, key)) {
      result.skippedSeen++;
      continue;
    }

    if (!passesInclusionRule(posting, rule)) {
      result.skippedFiltered++;
      continue;
    }

    result.accepted.push({ fingerprint: key, posting });
    result.insertions[key] = { title: posting.title, first_seen: firstSeen, uri: posting.url };
  }

  return result;
}

export function commitInsertions(seen: SeenStore, insertions: Readonly<Record<string, SeenEntry>>): SeenStore {
  return { ...seen, ...insertions };
}
