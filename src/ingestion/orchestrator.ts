import type { RunConfig } from '../config/run-config.js';
import type { Notifier } from '../discord/webhook.js';
import {
  CREDENTIALS_MISSING_MESSAGE,
  NO_NEW_ITEMS_MESSAGE,
  fetchFailedMessage,
  formatPostingMessage,
  noResultsMessage,
} from '../discord/messages.js';
import { loadSeen, saveSeen } from '../store/seen-store.js';
import type { StoreFs } from '../store/seen-store.js';
import type { JobProvider } from './providers/base.js';
import { UsaJobsProvider } from './providers/usajobs.js';
import type { FetchLike, Sleep } from './providers/usajobs.js';
import { commitInsertions, processResults } from './processor.js';
import { FetchExhaustedError, errorMessage } from './errors.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'orchestrator' });

export type RunOutcome =
  | { status: 'credentials-missing' }
  | { status: 'fetch-failed'; error: string }
  | { status: 'no-results'; totalCount: number }
  | { status: 'no-new-items'; totalCount: number; skippedSeen: number; skippedFiltered: number }
  | { status: 'notified'; totalCount: number; accepted: number; delivered: number; failed: number };

export interface RunDeps {
  notifier: Notifier;
  /** Search API fetch; defaults to the global fetch */
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  storeFs?: StoreFs;
  /** Overrides the provider built from config, mostly for tests */
  provider?: JobProvider;
}

export function hasCredentials(config: RunConfig): boolean {
  return Boolean(config.credentials.userAgent && config.credentials.apiKey);
}

/**
 * One pass of fetch → filter → diff → notify. Business failures are
 * logged and announced through the notifier and reported in the outcome;
 * the only thing that throws is a failure to write the seen store.
 */
export async function runOnce(config: RunConfig, deps: RunDeps): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date());
  const { notifier } = deps;

  if (!hasCredentials(config)) {
    log.error(CREDENTIALS_MISSING_MESSAGE);
    await notifier.send(CREDENTIALS_MISSING_MESSAGE);
    return { status: 'credentials-missing' };
  }

  const provider =
    deps.provider ??
    new UsaJobsProvider(config.search, config.credentials, config.retry, deps.fetchImpl, deps.sleep);

  let raw: unknown;
  try {
    raw = await provider.fetchJobs();
  } catch (err) {
    const lastError = err instanceof FetchExhaustedError ? err.lastError : errorMessage(err);
    const message = fetchFailedMessage(lastError);
    log.error({ err: lastError }, 'Search fetch failed after retries');
    if (config.notify.fetchFailure) {
      await notifier.send(message);
    }
    return { status: 'fetch-failed', error: lastError };
  }

  const seen = await loadSeen(config.seenPath, deps.storeFs);
  const result = processResults(raw, seen, config.filter, now());

  log.info(
    { total: result.totalCount, items: result.itemCount },
    'Fetched search results',
  );

  if (result.totalCount === 0 || result.itemCount === 0) {
    const message = noResultsMessage(config.queryDescription);
    log.info(message);
    if (config.notify.zeroResults) {
      await notifier.send(message);
    }
    return { status: 'no-results', totalCount: result.totalCount };
  }

  if (result.skippedMalformed > 0) {
    log.debug({ count: result.skippedMalformed }, 'Skipped items without a descriptor');
  }

  if (result.accepted.length === 0) {
    log.info(
      { seen: result.skippedSeen, filtered: result.skippedFiltered },
      NO_NEW_ITEMS_MESSAGE,
    );
    if (config.notify.noNewItems) {
      await notifier.send(NO_NEW_ITEMS_MESSAGE);
    }
    return {
      status: 'no-new-items',
      totalCount: result.totalCount,
      skippedSeen: result.skippedSeen,
      skippedFiltered: result.skippedFiltered,
    };
  }

  let delivered = 0;
  let failed = 0;
  for (const { fingerprint, posting } of result.accepted) {
    const status = await notifier.send(formatPostingMessage(posting));
    if (status === 'failed') {
      failed++;
      log.warn({ fingerprint, title: posting.title }, 'Alert not delivered; still marking as seen');
    } else {
      delivered++;
    }
  }

  // Persist once, after every alert was attempted
  await saveSeen(config.seenPath, commitInsertions(seen, result.insertions), deps.storeFs);
  log.info(
    {
      accepted: result.accepted.length,
      seen: result.skippedSeen,
      filtered: result.skippedFiltered,
      failed,
    },
    'Saved new items',
  );

  return {
    status: 'notified',
    totalCount: result.totalCount,
    accepted: result.accepted.length,
    delivered,
    failed,
  };
}
