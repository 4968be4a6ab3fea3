import { createHash } from 'node:crypto';
import { z } from 'zod';
import { descriptorSchema, searchResponseSchema, searchResultItemSchema } from './providers/base.js';
import type { PositionDescriptor, Posting } from './providers/base.js';

const FINGERPRINT_LENGTH = 24;

export interface SearchResultPage {
  totalCount: number;
  items: unknown[];
}

/** Collapse whitespace runs to single spaces and trim. */
export function normalizeText(value?: string | null): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * The API sends either a display string or a list of location objects.
 * Lists become a de-duplicated, sorted, comma-joined list of names.
 */
export function normalizeLocation(field: PositionDescriptor['PositionLocationDisplay']): string {
  if (Array.isArray(field)) {
    const names = new Set(field.map(loc => normalizeText(loc.LocationName)).filter(name => name.length > 0));
    return [...names].sort().join(', ');
  }
  return normalizeText(field);
}

/** First apply link, else the position page, else empty. */
export function resolveUrl(applyUris: readonly string[], positionUri?: string): string {
  return applyUris[0] || positionUri || '';
}

export function fingerprint(id: string, title: string, url: string): string {
  return createHash('sha256')
    .update(`${id}|${title}|${url}`, 'utf8')
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

export function postingFingerprint(posting: Pick<Posting, 'id' | 'title' | 'url'>): string {
  return fingerprint(posting.id, posting.title, posting.url);
}

/** A missing result list reads as zero items rather than an error. */
export function readSearchResult(raw: unknown): SearchResultPage {
  const parsed = searchResponseSchema.safeParse(raw);
  if (!parsed.success || !parsed.data.SearchResult) {
    return { totalCount: 0, items: [] };
  }

  const result = parsed.data.SearchResult;
  const items = result.SearchResultItems ?? [];
  const totalCount = typeof result.SearchResultCount === 'number' ? result.SearchResultCount : items.length;
  return { totalCount, items };
}

function isEmptyDescriptor(descriptor: unknown): boolean {
  const parsed = z.record(z.unknown()).safeParse(descriptor);
  return !parsed.success || Object.keys(parsed.data).length === 0;
}

/** Returns null for items whose descriptor is missing, empty or not an object. */
export function toPosting(item: unknown): Posting | null {
  const parsedItem = searchResultItemSchema.safeParse(item);
  if (!parsedItem.success || isEmptyDescriptor(parsedItem.data.MatchedObjectDescriptor)) return null;

  const parsedDescriptor = descriptorSchema.safeParse(parsedItem.data.MatchedObjectDescriptor);
  if (!parsedDescriptor.success) return null;

  const d = parsedDescriptor.data;
  const applyUris = d.ApplyURI ?? [];
  const positionUri = d.PositionURI ?? undefined;
  const grades = d.JobGrade ?? [];

  return {
    id: String(parsedItem.data.MatchedObjectId ?? ''),
    title: d.PositionTitle ?? '',
    organization: d.OrganizationName ?? '',
    location: normalizeLocation(d.PositionLocationDisplay),
    applyUris,
    positionUri,
    url: resolveUrl(applyUris, positionUri),
    grades,
    closeDate: d.ApplicationCloseDate ?? undefined,
  };
}
