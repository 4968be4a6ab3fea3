import type { Posting } from '../ingestion/providers/base.js';

/** Discord rejects message content longer than this. */
export const DISCORD_CONTENT_LIMIT = 2000;

export function truncate(text: string, limit: number = DISCORD_CONTENT_LIMIT): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit - 1)}…`;
}

export function formatPostingMessage(posting: Posting): string {
  const title = posting.title || 'Untitled';
  const grade = posting.grades.join(', ');
  const closing = posting.closeDate ? ` | Closes: ${posting.closeDate}` : '';
  return `🔔 **${title}** (${grade}) @ ${posting.organization}\n📍 ${posting.location}${closing}\n${posting.url}`;
}

export const CREDENTIALS_MISSING_MESSAGE =
  '❌ USAJOBS credentials missing: set USAJOBS_USER_AGENT and USAJOBS_API_KEY.';

export function fetchFailedMessage(lastError: string): string {
  return `🚨 USAJOBS fetch failed after retries: ${lastError}`;
}

export function noResultsMessage(queryDescription: string): string {
  return `ℹ️ No results for USAJOBS query today (${queryDescription}).`;
}

export const NO_NEW_ITEMS_MESSAGE = '🟦 No new items today (matches exist, but already seen or filtered out).';
