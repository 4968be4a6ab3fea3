import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { ConfigurationError, errorMessage } from '../ingestion/errors.js';

const numericString = z.union([z.string().min(1), z.number()]).transform(v => String(v));

const querySchema = z.object({
  job_category_codes: z.array(numericString).min(1),
  location_name: z.string().min(1),
  radius: numericString,
  pay_grade_low: numericString,
  pay_grade_high: numericString,
  fields: z.string().default('All'),
  who_may_apply: z.string().default('all'),
  sort_field: z.string().default('openingdate'),
  sort_direction: z.enum(['asc', 'desc']).default('desc'),
  results_per_page: numericString.default('50'),
});

const filtersSchema = z.object({
  title_phrases: z.array(z.string().min(1)).default([]),
  grade_patterns: z
    .array(
      z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' }),
    )
    .default([]),
});

const searchConfigSchema = z.object({
  endpoint: z.string().url().default('https://data.usajobs.gov/api/Search'),
  query: querySchema,
  filters: filtersSchema.default({}),
  notify: z
    .object({
      fetch_failure: z.boolean().default(true),
      zero_results: z.boolean().default(true),
      no_new_items: z.boolean().default(true),
    })
    .default({}),
  retry: z
    .object({
      attempts: z.number().int().min(1).default(3),
      backoff_seconds: z.number().nonnegative().default(5),
      timeout_seconds: z.number().positive().default(30),
    })
    .default({}),
  time_gate: z
    .object({
      timezone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' }).default('America/Los_Angeles'),
      hour: z.number().int().min(0).max(23).default(20),
    })
    .default({}),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchQuery = z.infer<typeof querySchema>;
export type FiltersConfig = z.infer<typeof filtersSchema>;

const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_SEARCH_CONFIG_PATH = resolve(__dirname, '../../config/search.yml');

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function parseSearchConfig(raw: string): SearchConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new ConfigurationError(`Search config is not valid YAML: ${errorMessage(err)}`);
  }

  const result = searchConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid search config: ${JSON.stringify(result.error.flatten().fieldErrors)}`,
    );
  }
  return result.data;
}

export function loadSearchConfig(path: string = DEFAULT_SEARCH_CONFIG_PATH): SearchConfig {
  const log = logger.child({ module: 'config:search' });

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read search config at ${path}: ${errorMessage(err)}`);
  }

  const config = parseSearchConfig(raw);
  log.info(
    {
      path,
      series: config.query.job_category_codes,
      location: config.query.location_name,
      titlePhrases: config.filters.title_phrases.length,
      gradePatterns: config.filters.grade_patterns.length,
    },
    'Search config loaded',
  );
  return config;
}

/** Query string parameters exactly as the Search API expects them. */
export function toQueryParams(query: SearchQuery): Record<string, string> {
  return {
    JobCategoryCode: query.job_category_codes.join(':'),
    LocationName: query.location_name,
    Radius: query.radius,
    PayGradeLow: query.pay_grade_low,
    PayGradeHigh: query.pay_grade_high,
    Fields: query.fields,
    WhoMayApply: query.who_may_apply,
    SortField: query.sort_field,
    SortDirection: query.sort_direction,
    ResultsPerPage: query.results_per_page,
  };
}

/** Short human description of the query, e.g. "Series 1176/1173, 92055±25mi, GS09–GS12". */
export function describeQuery(query: SearchQuery): string {
  return (
    `Series ${query.job_category_codes.join('/')}, ` +
    `${query.location_name}±${query.radius}mi, ` +
    `GS${query.pay_grade_low}–GS${query.pay_grade_high}`
  );
}
