import type { JobProvider } from './base.js';
import type { Credentials, RetryPolicy, SearchRequest } from '../../config/run-config.js';
import { FetchExhaustedError, FetchTransientError, errorMessage } from '../errors.js';
import { logger } from '../../observability/logger.js';

const log = logger.child({ module: 'provider:usajobs' });

const ERROR_BODY_LIMIT = 200;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export function buildHeaders(credentials: Credentials): Record<string, string> {
  return {
    'User-Agent': credentials.userAgent ?? '',
    'Authorization-Key': credentials.apiKey ?? '',
    Accept: 'application/json',
  };
}

export function buildSearchUrl(request: SearchRequest): string {
  const url = new URL(request.endpoint);
  for (const [key, value] of Object.entries(request.params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/** Delay before retrying after failed attempt `attempt` (1-based). */
export function backoffMs(attempt: number, baseBackoffSeconds: number): number {
  return baseBackoffSeconds * 2 ** (attempt - 1) * 1000;
}

export class UsaJobsProvider implements JobProvider {
  readonly name = 'usajobs';
  private request: SearchRequest;
  private headers: Record<string, string>;
  private policy: RetryPolicy;
  private fetchImpl: FetchLike;
  private sleep: Sleep;

  constructor(
    request: SearchRequest,
    credentials: Credentials,
    policy: RetryPolicy,
    fetchImpl: FetchLike = fetch,
    sleep: Sleep = defaultSleep,
  ) {
    this.request = request;
    this.headers = buildHeaders(credentials);
    this.policy = policy;
    this.fetchImpl = fetchImpl;
    this.sleep = sleep;
  }

  async fetchJobs(): Promise<unknown> {
    return this.fetchWithRetries();
  }

  /**
   * Sequential attempts with exponential backoff (base, base*2, base*4...).
   * Returns the first 200 response's parsed body; throws FetchExhaustedError
   * carrying the last failure once every attempt is spent.
   */
  async fetchWithRetries(): Promise<unknown> {
    const { maxAttempts, baseBackoffSeconds } = this.policy;
    const url = buildSearchUrl(this.request);
    let lastError = 'Unknown fetch error';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const body = await this.attempt(url);
        log.info({ attempt }, 'Search request succeeded');
        return body;
      } catch (err) {
        lastError = errorMessage(err);
        log.error({ attempt, maxAttempts, err: lastError }, 'Search attempt failed');
      }

      if (attempt < maxAttempts) {
        const delay = backoffMs(attempt, baseBackoffSeconds);
        log.info({ delayMs: delay }, 'Backing off before retry');
        await this.sleep(delay);
      }
    }

    throw new FetchExhaustedError(lastError, maxAttempts);
  }

  private async attempt(url: string): Promise<unknown> {
    const timeoutMs = this.policy.timeoutSeconds * 1000;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      log.debug({ url }, 'Fetching search results');
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
      });
      const text = await response.text();

      if (response.status !== 200) {
        throw new FetchTransientError(
          `HTTP ${response.status}: ${text.slice(0, ERROR_BODY_LIMIT)}`,
          response.status,
        );
      }

      try {
        return JSON.parse(text);
      } catch (err) {
        throw new FetchTransientError(`Malformed JSON body: ${errorMessage(err)}`, response.status, {
          cause: err,
        });
      }
    } catch (err) {
      if (err instanceof FetchTransientError) throw err;
      if (controller.signal.aborted) {
        throw new FetchTransientError(`Request timed out after ${this.policy.timeoutSeconds}s`, undefined, {
          cause: err,
        });
      }
      throw new FetchTransientError(errorMessage(err), undefined, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
