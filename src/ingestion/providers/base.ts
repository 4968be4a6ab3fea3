import { z } from 'zod';

// Only the fields the watcher reads; the Search API returns many more.
// A field that is null or of the wrong type reads as absent instead of
// rejecting the posting, and bad list entries are dropped one by one.
const text = z.string().nullish().catch(undefined);

const locationEntrySchema = z.object({ LocationName: z.string() }).passthrough();

const locationListSchema = z.array(z.unknown()).transform(entries =>
  entries.flatMap(entry => {
    const parsed = locationEntrySchema.safeParse(entry);
    return parsed.success ? [{ LocationName: parsed.data.LocationName }] : [];
  }),
);

const gradeListSchema = z.array(z.unknown()).transform(entries =>
  entries.flatMap(entry => {
    const parsed = z.object({ Code: z.string().min(1) }).passthrough().safeParse(entry);
    return parsed.success ? [parsed.data.Code] : [];
  }),
);

const uriListSchema = z
  .union([z.string().transform((uri): unknown[] => [uri]), z.array(z.unknown())])
  .transform(entries => entries.filter((uri): uri is string => typeof uri === 'string' && uri.length > 0));

export const descriptorSchema = z.object({
  PositionTitle: text,
  OrganizationName: text,
  PositionLocationDisplay: z.union([z.string(), locationListSchema]).nullish().catch(undefined),
  ApplyURI: uriListSchema.nullish().catch(undefined),
  PositionURI: text,
  JobGrade: gradeListSchema.nullish().catch(undefined),
  ApplicationCloseDate: text,
});

export const searchResultItemSchema = z.object({
  MatchedObjectId: z.union([z.string(), z.number()]).nullish().catch(undefined),
  MatchedObjectDescriptor: z.unknown().optional(),
});

// The counts never decide whether the item list survives
export const searchResponseSchema = z.object({
  SearchResult: z
    .object({
      SearchResultCount: z.number().nullish().catch(undefined),
      SearchResultItems: z.array(z.unknown()).nullish().catch(undefined),
    })
    .passthrough()
    .nullish()
    .catch(undefined),
});

export type PositionDescriptor = z.infer<typeof descriptorSchema>;

/** One announcement, reduced to what the watcher fingerprints, filters and formats. */
export interface Posting {
  id: string;
  title: string;
  organization: string;
  location: string;
  applyUris: string[];
  positionUri?: string;
  url: string;
  grades: string[];
  closeDate?: string;
}

export interface JobProvider {
  name: string;
  fetchJobs(): Promise<unknown>;
}
