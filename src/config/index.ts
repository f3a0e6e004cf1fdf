import cron from 'node-cron';
import {
  JOB_FAMILIES,
  JobFamilyDefinition,
  REMOTEOK_RELEVANCE_KEYWORDS,
} from './job-families';
import { LogLevel, parseLogLevel } from '../utils/logger';

/**
 * Configuration management
 * Credentials and tuning come from environment variables, search
 * definitions from job-families.ts. Loaded once and passed down.
 */

export interface ExperienceWindow {
  minYears: number;
  maxYears: number;
}

export interface Config {
  // Sources
  jsearch: {
    apiKey: string;
    host: string;
    pageDelayMs: number;
  };
  adzuna: {
    appId: string;
    appKey: string;
    countryCode: string;
  };
  remoteOk: {
    enabled: boolean;
    relevanceKeywords: readonly string[];
  };
  requestTimeoutMs: number;

  // Search
  jobLocation: string;
  experience: ExperienceWindow;
  resultsPerPage: number;
  maxPagesPerSource: number;
  jobFamilies: readonly JobFamilyDefinition[];

  // Output
  outputDir: string;
  csvFilenamePrefix: string;

  // Notification channels
  sns: {
    region: string;
    accessKeyId: string;
    secretAccessKey: string;
    topicArn: string;
  };
  telegram: {
    botToken: string;
    chatId: string;
  };

  // Scheduling
  schedule: {
    expression: string;
    timezone: string;
    retries: number;
    retryDelayMs: number;
  };

  logLevel: LogLevel;
}

function parseStringArray(value: string | undefined, defaultValue: readonly string[] = []): readonly string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseString(value: string | undefined, defaultValue: string = ''): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const experience: ExperienceWindow = {
    minYears: parseNumber(env.EXPERIENCE_MIN_YEARS, 3),
    maxYears: parseNumber(env.EXPERIENCE_MAX_YEARS, 7),
  };

  if (experience.minYears < 0 || experience.minYears > experience.maxYears) {
    throw new Error(
      `Invalid experience window: ${experience.minYears}-${experience.maxYears} years`
    );
  }

  const expression = parseString(env.SCAN_SCHEDULE, '0 */6 * * *');
  if (!cron.validate(expression)) {
    throw new Error(`Invalid SCAN_SCHEDULE cron expression: ${expression}`);
  }

  const maxPagesPerSource = parseNumber(env.MAX_PAGES_PER_SOURCE, 3);
  if (maxPagesPerSource < 1) {
    throw new Error(`MAX_PAGES_PER_SOURCE must be at least 1, got ${maxPagesPerSource}`);
  }

  return Object.freeze({
    jsearch: Object.freeze({
      apiKey: parseString(env.RAPIDAPI_KEY),
      host: parseString(env.JSEARCH_HOST, 'jsearch.p.rapidapi.com'),
      pageDelayMs: parseNumber(env.JSEARCH_PAGE_DELAY_MS, 1000),
    }),
    adzuna: Object.freeze({
      appId: parseString(env.ADZUNA_APP_ID),
      appKey: parseString(env.ADZUNA_APP_KEY),
      countryCode: parseString(env.JOB_COUNTRY_CODE, 'us'),
    }),
    remoteOk: Object.freeze({
      enabled: parseBoolean(env.REMOTEOK_ENABLED, true),
      relevanceKeywords: Object.freeze(
        parseStringArray(env.REMOTEOK_KEYWORDS, REMOTEOK_RELEVANCE_KEYWORDS)
      ),
    }),
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 30000),
    jobLocation: parseString(env.JOB_LOCATION, 'United States'),
    experience: Object.freeze(experience),
    resultsPerPage: parseNumber(env.RESULTS_PER_PAGE, 20),
    maxPagesPerSource,
    jobFamilies: JOB_FAMILIES,
    outputDir: parseString(env.OUTPUT_DIR, 'output'),
    csvFilenamePrefix: parseString(env.CSV_FILENAME_PREFIX, 'data_jobs'),
    sns: Object.freeze({
      region: parseString(env.AWS_REGION, 'us-east-1'),
      accessKeyId: parseString(env.AWS_ACCESS_KEY_ID),
      secretAccessKey: parseString(env.AWS_SECRET_ACCESS_KEY),
      topicArn: parseString(env.SNS_TOPIC_ARN),
    }),
    telegram: Object.freeze({
      botToken: parseString(env.TELEGRAM_BOT_TOKEN),
      chatId: parseString(env.TELEGRAM_CHAT_ID),
    }),
    schedule: Object.freeze({
      expression,
      timezone: parseString(env.SCAN_TIMEZONE, 'UTC'),
      retries: parseNumber(env.SCAN_RETRIES, 2),
      retryDelayMs: parseNumber(env.SCAN_RETRY_DELAY_MINUTES, 5) * 60_000,
    }),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  });
}
