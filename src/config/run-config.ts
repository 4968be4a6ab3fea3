import type { Env } from './env.js';
import { describeQuery, toQueryParams } from './search.js';
import type { SearchConfig } from './search.js';

export interface SearchRequest {
  readonly endpoint: string;
  readonly params: Readonly<Record<string, string>>;
}

export interface Credentials {
  readonly userAgent?: string;
  readonly apiKey?: string;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseBackoffSeconds: number;
  readonly timeoutSeconds: number;
}

export interface NotifyToggles {
  readonly fetchFailure: boolean;
  readonly zeroResults: boolean;
  readonly noNewItems: boolean;
}

export interface TimeGateConfig {
  readonly enabled: boolean;
  readonly timezone: string;
  readonly hour: number;
}

export interface FilterRule {
  readonly titlePhrases: readonly string[];
  readonly gradePatterns: readonly string[];
}

/** Everything one run needs. Built once at startup and never mutated. */
export interface RunConfig {
  readonly search: SearchRequest;
  readonly queryDescription: string;
  readonly credentials: Credentials;
  readonly retry: RetryPolicy;
  readonly notify: NotifyToggles;
  readonly timeGate: TimeGateConfig;
  readonly filter: FilterRule;
  readonly webhookUrl?: string;
  readonly seenPath: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildRunConfig(env: Env, search: SearchConfig): RunConfig {
  const config: RunConfig = {
    search: {
      endpoint: search.endpoint,
      params: toQueryParams(search.query),
    },
    queryDescription: describeQuery(search.query),
    credentials: {
      userAgent: env.USAJOBS_USER_AGENT,
      apiKey: env.USAJOBS_API_KEY,
    },
    retry: {
      maxAttempts: search.retry.attempts,
      baseBackoffSeconds: search.retry.backoff_seconds,
      timeoutSeconds: search.retry.timeout_seconds,
    },
    notify: {
      fetchFailure: search.notify.fetch_failure,
      zeroResults: search.notify.zero_results,
      noNewItems: search.notify.no_new_items,
    },
    timeGate: {
      enabled: env.ENFORCE_TIME_GATE,
      timezone: search.time_gate.timezone,
      hour: search.time_gate.hour,
    },
    filter: {
      titlePhrases: [...search.filters.title_phrases],
      gradePatterns: [...search.filters.grade_patterns],
    },
    webhookUrl: env.DISCORD_WEBHOOK,
    seenPath: env.SEEN_PATH,
  };
  return deepFreeze(config);
}
