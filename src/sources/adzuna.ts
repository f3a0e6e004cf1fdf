import { JobSource, sourceTag } from './base';
import { getJson, objectArray, readNumber, readObject, readString, isJsonObject, JsonObject } from './http';
import { RawPosting } from '../types/job';
import { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * Adzuna API adapter (Monster, CareerBuilder, SimplyHired)
 * API Documentation: https://developer.adzuna.com/docs/search
 */
export class AdzunaSource implements JobSource {
  readonly name = 'Adzuna (Monster/CareerBuilder)';
  readonly tag = sourceTag(this.name);
  readonly pageDelayMs = 0;

  constructor(private config: Config) {}

  async fetchJobs(jobTitle: string, page: number): Promise<RawPosting[]> {
    const { appId, appKey, countryCode } = this.config.adzuna;
    if (!appId || !appKey) {
      logger.warn(`Adzuna API keys not configured, skipping ${this.tag}`);
      return [];
    }

    try {
      const data = await getJson(
        `https://api.adzuna.com/v1/api/jobs/${encodeURIComponent(countryCode)}/search/${page}`,
        {
          params: {
            app_id: appId,
            app_key: appKey,
            what: jobTitle,
            where: this.config.jobLocation,
            results_per_page: this.config.resultsPerPage,
            max_days_old: 7,
            sort_by: 'date',
          },
          timeoutMs: this.config.requestTimeoutMs,
        }
      );

      const items = isJsonObject(data) ? objectArray(data.results) : [];
      logger.debug(`Fetched ${items.length} postings from ${this.tag}`, { jobTitle, page });
      return items.map(item => this.toPosting(item));
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.tag}`, error, { jobTitle, page });
      return [];
    }
  }

  private toPosting(job: JsonObject): RawPosting {
    const title = readString(job, 'title');
    const description = readString(job, 'description');
    const displayName = readString(readObject(job, 'location'), 'display_name');

    return {
      jobId: readString(job, 'id'),
      title,
      company: readString(readObject(job, 'company'), 'display_name'),
      location: displayName.split(', ').slice(0, 2).join(', '),
      jobType: readString(job, 'contract_type') || undefined,
      remote: title.toLowerCase().includes('remote') || description.toLowerCase().includes('remote'),
      postedDate: readString(job, 'created'),
      applyLink: readString(job, 'redirect_url'),
      description,
      salaryMin: readNumber(job, 'salary_min'),
      salaryMax: readNumber(job, 'salary_max'),
      salaryCurrency: 'USD',
    };
  }
}
