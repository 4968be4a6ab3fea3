import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../ingestion/errors.js';

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .transform(v => v === '1' || v === 'true' || v === 'yes');

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

const envSchema = z.object({
  // Credentials are checked by the run itself so a missing key still produces an alert
  USAJOBS_USER_AGENT: optionalText,
  USAJOBS_API_KEY: optionalText,
  DISCORD_WEBHOOK: optionalText.pipe(z.string().url().optional()),
  ENFORCE_TIME_GATE: flag.default('1'),
  SEEN_PATH: z.string().min(1).default('seen_usajobs.json'),
  SEARCH_CONFIG_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const fields = result.error.flatten().fieldErrors;
    throw new ConfigurationError(`Invalid environment variables: ${JSON.stringify(fields)}`);
  }
  return result.data;
}
