import { JobFamily } from '../families/job-family';
import { JobPosting } from '../types/job';
import { logger } from '../utils/logger';

export interface FetchResult {
  jobs: JobPosting[];
  byFamily: Record<string, number>;
  bySource: Record<string, number>;
  crossFamilyDuplicates: number;
}

/**
 * Orchestrates job fetching across all job families
 * Families run one after another; their output is merged on the qualified id
 * and a posting is counted for the first family that found it
 */
export class JobFetcherService {
  constructor(private families: JobFamily[]) {}

  async fetchAllJobs(): Promise<FetchResult> {
    const jobs: JobPosting[] = [];
    const seenJobIds = new Set<string>();
    const byFamily: Record<string, number> = {};
    const bySource: Record<string, number> = {};
    let crossFamilyDuplicates = 0;

    for (const family of this.families) {
      logger.info(`Running job family: ${family.label}`);
      const result = await family.scrapeJobs();
      byFamily[result.family] = 0;

      for (const job of result.jobs) {
        if (seenJobIds.has(job.jobId)) {
          crossFamilyDuplicates++;
          continue;
        }
        seenJobIds.add(job.jobId);
        jobs.push(job);
        byFamily[result.family]++;
        bySource[job.source] = (bySource[job.source] ?? 0) + 1;
      }
    }

    logger.info(`Fetched ${jobs.length} jobs total`, {
      byFamily,
      bySource,
      crossFamilyDuplicates,
    });

    return { jobs, byFamily, bySource, crossFamilyDuplicates };
  }
}
