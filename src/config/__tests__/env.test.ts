import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';
import { ConfigurationError } from '../../ingestion/errors.js';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});
    expect(env.ENFORCE_TIME_GATE).toBe(true);
    expect(env.SEEN_PATH).toBe('seen_usajobs.json');
    expect(env.USAJOBS_API_KEY).toBeUndefined();
    expect(env.DISCORD_WEBHOOK).toBeUndefined();
  });

  it('turns the time gate off with 0', () => {
    expect(loadEnv({ ENFORCE_TIME_GATE: '0' }).ENFORCE_TIME_GATE).toBe(false);
  });

  it('accepts true as an on value', () => {
    expect(loadEnv({ ENFORCE_TIME_GATE: 'TRUE' }).ENFORCE_TIME_GATE).toBe(true);
  });

  it('treats blank credentials as missing', () => {
    expect(loadEnv({ USAJOBS_USER_AGENT: '   ' }).USAJOBS_USER_AGENT).toBeUndefined();
  });

  it('trims credentials', () => {
    expect(loadEnv({ USAJOBS_API_KEY: ' test-api-key ' }).USAJOBS_API_KEY).toBe('test-api-key');
  });

  it('rejects a webhook that is not a URL', () => {
    expect(() => loadEnv({ DISCORD_WEBHOOK: 'not a url' })).toThrow(ConfigurationError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});
