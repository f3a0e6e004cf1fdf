import { describe, it, expect } from 'vitest';
import { loadConfig } from './index';
import { JOB_FAMILIES, REMOTEOK_RELEVANCE_KEYWORDS } from './job-families';
import { LogLevel } from '../utils/logger';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.jsearch).toEqual({ apiKey: '', host: 'jsearch.p.rapidapi.com', pageDelayMs: 1000 });
    expect(config.adzuna).toEqual({ appId: '', appKey: '', countryCode: 'us' });
    expect(config.remoteOk).toEqual({ enabled: true, relevanceKeywords: REMOTEOK_RELEVANCE_KEYWORDS });
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.jobLocation).toBe('United States');
    expect(config.experience).toEqual({ minYears: 3, maxYears: 7 });
    expect(config.resultsPerPage).toBe(20);
    expect(config.maxPagesPerSource).toBe(3);
    expect(config.jobFamilies).toBe(JOB_FAMILIES);
    expect(config.outputDir).toBe('output');
    expect(config.csvFilenamePrefix).toBe('data_jobs');
    expect(config.sns.region).toBe('us-east-1');
    expect(config.schedule).toEqual({
      expression: '0 */6 * * *',
      timezone: 'UTC',
      retries: 2,
      retryDelayMs: 300000,
    });
    expect(config.logLevel).toBe(LogLevel.INFO);
  });

  it('reads the log level from LOG_LEVEL', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' }).logLevel).toBe(LogLevel.DEBUG);
    expect(loadConfig({ LOG_LEVEL: 'loud' }).logLevel).toBe(LogLevel.INFO);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      RAPIDAPI_KEY: ' test-key ',
      EXPERIENCE_MIN_YEARS: '2',
      EXPERIENCE_MAX_YEARS: '5',
      REMOTEOK_ENABLED: 'FALSE',
      REMOTEOK_KEYWORDS: 'data engineer, dbt ,',
      MAX_PAGES_PER_SOURCE: '5',
      SCAN_RETRY_DELAY_MINUTES: '1',
    });

    expect(config.jsearch.apiKey).toBe('test-key');
    expect(config.experience).toEqual({ minYears: 2, maxYears: 5 });
    expect(config.remoteOk).toEqual({ enabled: false, relevanceKeywords: ['data engineer', 'dbt'] });
    expect(config.maxPagesPerSource).toBe(5);
    expect(config.schedule.retryDelayMs).toBe(60000);
  });

  it('falls back to the default for unparseable numbers', () => {
    expect(loadConfig({ RESULTS_PER_PAGE: 'many' }).resultsPerPage).toBe(20);
  });

  it('rejects an inverted experience window', () => {
    expect(() => loadConfig({ EXPERIENCE_MIN_YEARS: '8', EXPERIENCE_MAX_YEARS: '4' }))
      .toThrow('Invalid experience window: 8-4 years');
  });

  it('rejects an invalid cron expression', () => {
    expect(() => loadConfig({ SCAN_SCHEDULE: 'every six hours' }))
      .toThrow('Invalid SCAN_SCHEDULE cron expression: every six hours');
  });

  it('rejects a page cap below one', () => {
    expect(() => loadConfig({ MAX_PAGES_PER_SOURCE: '0' }))
      .toThrow('MAX_PAGES_PER_SOURCE must be at least 1, got 0');
  });

  it('returns a frozen object', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.experience)).toBe(true);
    expect(Object.isFrozen(config.jobFamilies)).toBe(true);
    for (const family of config.jobFamilies) {
      expect(Object.isFrozen(family)).toBe(true);
      expect(Object.isFrozen(family.searchTerms)).toBe(true);
    }
    expect(Object.isFrozen(config.jobFamilies[2].skillGate?.keywords)).toBe(true);
  });
});
