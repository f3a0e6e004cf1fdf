import { Config } from '../config';
import { createJobSources } from '../sources';
import { createJobFamilies } from '../families/job-family';
import { JobFetcherService } from './job-fetcher';
import { exportToCsv } from './csv-exporter';
import { NotificationDispatcher, createNotificationChannels } from './notification-dispatcher';
import { ScanType } from './channels/types';
import { logger } from '../utils/logger';

export interface ScanDeps {
  config: Config;
  fetcher: JobFetcherService;
  dispatcher: NotificationDispatcher;
  now?: () => Date;
}

export interface ScanResult {
  jobCount: number;
  csvPath: string;
  notified: boolean;
  byFamily: Record<string, number>;
  bySource: Record<string, number>;
  durationMs: number;
}

export function createScanDeps(config: Config): ScanDeps {
  const sources = createJobSources(config);
  const families = createJobFamilies(config, sources);
  return {
    config,
    fetcher: new JobFetcherService(families),
    dispatcher: new NotificationDispatcher(config, createNotificationChannels(config)),
  };
}

/**
 * One pipeline pass: scrape -> CSV -> notification, strictly in sequence.
 * Errors other than the ones the stages swallow propagate to the caller.
 */
export async function runScan(deps: ScanDeps, scanType: ScanType = 'Scheduled'): Promise<ScanResult> {
  const now = deps.now ?? (() => new Date());
  const startTime = Date.now();
  const { config } = deps;

  logger.info('Job scan started', {
    scanType,
    families: config.jobFamilies.map(family => family.label),
    location: config.jobLocation,
    experience: config.experience,
    maxPagesPerSource: config.maxPagesPerSource,
  });

  // Step 1: Scrape all job families
  const { jobs, byFamily, bySource } = await deps.fetcher.fetchAllJobs();

  // Step 2: Export to CSV
  const csvPath = await exportToCsv(jobs, {
    outputDir: config.outputDir,
    filenamePrefix: config.csvFilenamePrefix,
    now: now(),
  });

  // Step 3: Notify
  const notified = await deps.dispatcher.sendScanSummary({
    jobCount: jobs.length,
    csvPath,
    byFamily,
    scanType,
    scannedAt: now(),
  });
  if (!notified) {
    logger.warn('Scan summary was not delivered');
  }

  const durationMs = Date.now() - startTime;
  logger.info('Job scan completed', {
    duration: `${durationMs}ms`,
    jobCount: jobs.length,
    csvPath,
    notified,
  });

  return { jobCount: jobs.length, csvPath, notified, byFamily, bySource, durationMs };
}
