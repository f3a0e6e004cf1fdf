import { JobSource, sourceTag } from './base';
import { getJson, objectArray, readNumber, readString, isJsonObject, JsonObject } from './http';
import { RawPosting } from '../types/job';
import { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * JSearch API adapter (RapidAPI)
 * Aggregates LinkedIn, Indeed, Glassdoor and ZipRecruiter listings
 * API Documentation: https://rapidapi.com/letscrape-6bRBa3QguO5/api/jsearch
 */
export class JSearchSource implements JobSource {
  readonly name = 'JSearch (LinkedIn/Indeed/Glassdoor)';
  readonly tag = sourceTag(this.name);
  readonly pageDelayMs: number;

  constructor(private config: Config) {
    this.pageDelayMs = config.jsearch.pageDelayMs;
  }

  async fetchJobs(jobTitle: string, page: number): Promise<RawPosting[]> {
    const { apiKey, host } = this.config.jsearch;
    if (!apiKey) {
      logger.warn(`RAPIDAPI_KEY not configured, skipping ${this.tag}`);
      return [];
    }

    try {
      const data = await getJson(`https://${host}/search`, {
        params: {
          query: `${jobTitle} in ${this.config.jobLocation}`,
          page: String(page),
          num_pages: '1',
          date_posted: 'week',
        },
        headers: {
          'X-RapidAPI-Key': apiKey,
          'X-RapidAPI-Host': host,
        },
        timeoutMs: this.config.requestTimeoutMs,
      });

      const items = isJsonObject(data) ? objectArray(data.data) : [];
      logger.debug(`Fetched ${items.length} postings from ${this.tag}`, { jobTitle, page });
      return items.map(item => this.toPosting(item));
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.tag}`, error, { jobTitle, page });
      return [];
    }
  }

  private toPosting(job: JsonObject): RawPosting {
    return {
      jobId: readString(job, 'job_id'),
      title: readString(job, 'job_title'),
      company: readString(job, 'employer_name'),
      location: `${readString(job, 'job_city')}, ${readString(job, 'job_state')}`,
      jobType: readString(job, 'job_employment_type') || undefined,
      remote: job.job_is_remote === true,
      postedDate: readString(job, 'job_posted_at_datetime_utc'),
      applyLink: readString(job, 'job_apply_link'),
      description: readString(job, 'job_description'),
      salaryMin: readNumber(job, 'job_min_salary'),
      salaryMax: readNumber(job, 'job_max_salary'),
      salaryCurrency: readString(job, 'job_salary_currency') || undefined,
    };
  }
}
