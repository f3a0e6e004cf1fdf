import { promises as fs } from 'fs';
import { join } from 'path';
import { JobPosting } from '../types/job';
import { logger } from '../utils/logger';

type CsvValue = string | number | boolean | undefined;

/**
 * Column order of the exported file: header -> row accessor
 */
export const CSV_COLUMNS: ReadonlyArray<[string, (job: JobPosting) => CsvValue]> = [
  ['job_id', job => job.jobId],
  ['title', job => job.title],
  ['company', job => job.company],
  ['location', job => job.location],
  ['remote', job => job.remote],
  ['job_type', job => job.jobType],
  ['posted_date', job => job.postedDate],
  ['apply_link', job => job.applyLink],
  ['salary_min', job => job.salaryMin],
  ['salary_max', job => job.salaryMax],
  ['salary_currency', job => job.salaryCurrency],
  ['experience_required', job => job.experienceRequired],
  ['source', job => job.source],
  ['scraped_at', job => job.scrapedAt],
  ['description_snippet', job => job.descriptionSnippet],
  ['job_family', job => job.jobFamily],
];

export interface CsvExportOptions {
  outputDir: string;
  filenamePrefix: string;
  now?: Date;
}

/**
 * Escape CSV field (handle commas, quotes, newlines)
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === undefined) return '';
  const text = String(value);

  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp used in file names: YYYYMMDD_HHMMSS
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function toCsv(jobs: JobPosting[]): string {
  const header = CSV_COLUMNS.map(([name]) => name).join(',');
  const rows = jobs.map(job =>
    CSV_COLUMNS.map(([, read]) => escapeCsvField(read(job))).join(',')
  );
  return [header, ...rows].join('\n') + '\n';
}

/**
 * Writes the postings to `<outputDir>/<prefix>_<timestamp>.csv`.
 * An empty list still produces a file with the header row.
 */
export async function exportToCsv(jobs: JobPosting[], options: CsvExportOptions): Promise<string> {
  await fs.mkdir(options.outputDir, { recursive: true });

  const filename = `${options.filenamePrefix}_${fileTimestamp(options.now ?? new Date())}.csv`;
  const filepath = join(options.outputDir, filename);

  if (jobs.length === 0) {
    logger.warn('No jobs to export, writing CSV with headers only');
  }

  await fs.writeFile(filepath, toCsv(jobs), 'utf-8');

  const bySource: Record<string, number> = {};
  let remoteCount = 0;
  for (const job of jobs) {
    bySource[job.source] = (bySource[job.source] ?? 0) + 1;
    if (job.remote) remoteCount++;
  }

  logger.info('CSV export complete', {
    file: filepath,
    total: jobs.length,
    bySource,
    remote: jobs.length > 0
      ? `${remoteCount} (${((remoteCount / jobs.length) * 100).toFixed(1)}%)`
      : '0',
  });

  return filepath;
}

/**
 * Most recently modified CSV in the directory, or null when there is none
 */
export async function getLatestCsv(outputDir: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(outputDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let latest: { path: string; mtimeMs: number } | null = null;
  for (const entry of entries.filter(name => name.endsWith('.csv'))) {
    const path = join(outputDir, entry);
    const { mtimeMs } = await fs.stat(path);
    if (!latest || mtimeMs > latest.mtimeMs) {
      latest = { path, mtimeMs };
    }
  }

  return latest ? latest.path : null;
}
