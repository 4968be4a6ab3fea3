import type { RunConfig } from '../../config/run-config.js';

export interface ItemOverrides {
  title?: string;
  organization?: string | null;
  location?: unknown;
  applyUris?: string[] | null;
  positionUri?: string | null;
  grades?: string[];
  closeDate?: string | null;
}

export function makeItem(id: string, overrides: ItemOverrides = {}): Record<string, unknown> {
  return {
    MatchedObjectId: id,
    MatchedObjectDescriptor: {
      PositionTitle: overrides.title ?? 'Housing Management Specialist',
      OrganizationName: overrides.organization === undefined ? 'Department of the Navy' : overrides.organization,
      PositionLocationDisplay: overrides.location ?? 'Camp Pendleton, California',
      ApplyURI: overrides.applyUris === undefined ? [`https://example.test/job/${id}/apply`] : overrides.applyUris,
      PositionURI: overrides.positionUri === undefined ? `https://example.test/job/${id}` : overrides.positionUri,
      JobGrade: (overrides.grades ?? ['GS']).map(Code => ({ Code })),
      ApplicationCloseDate: overrides.closeDate === undefined ? '2026-11-01T23:59:59.9970' : overrides.closeDate,
    },
  };
}

export function makeResponse(items: unknown[], count: number = items.length): Record<string, unknown> {
  return {
    LanguageCode: 'EN',
    SearchResult: {
      SearchResultCount: count,
      SearchResultCountAll: count,
      SearchResultItems: items,
    },
  };
}

export function makeConfig(seenPath: string, overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    search: {
      endpoint: 'https://data.usajobs.gov/api/Search',
      params: { JobCategoryCode: '1176:1173', LocationName: '92055' },
    },
    queryDescription: 'Series 1176/1173, 92055±25mi, GS09–GS12',
    credentials: { userAgent: 'watcher@example.test', apiKey: 'test-api-key' },
    retry: { maxAttempts: 3, baseBackoffSeconds: 5, timeoutSeconds: 30 },
    notify: { fetchFailure: true, zeroResults: true, noNewItems: true },
    timeGate: { enabled: false, timezone: 'America/Los_Angeles', hour: 20 },
    filter: { titlePhrases: ['housing'], gradePatterns: [] },
    seenPath,
    ...overrides,
  };
}
