import { JobSource, sourceTag } from './base';
import { getJson, objectArray, readNumber, readString, JsonObject } from './http';
import { RawPosting } from '../types/job';
import { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 *
 * The feed has no search or pagination: every call returns the whole
 * board, so relevance filtering happens here and `page` is ignored.
 */
export class RemoteOKSource implements JobSource {
  readonly name = 'RemoteOK (Remote Jobs)';
  readonly tag = sourceTag(this.name);
  readonly pageDelayMs = 0;
  private readonly apiUrl = 'https://remoteok.com/api';

  constructor(private config: Config) {}

  async fetchJobs(_jobTitle: string, _page: number): Promise<RawPosting[]> {
    if (!this.config.remoteOk.enabled) {
      return [];
    }

    try {
      const data = await getJson(this.apiUrl, {
        headers: { 'User-Agent': 'JobScanPipeline/1.0' },
        timeoutMs: this.config.requestTimeoutMs,
      });

      if (!Array.isArray(data)) {
        logger.warn(`RemoteOK API returned non-array data: ${typeof data}`);
        return [];
      }

      // The first entry is a legal/metadata notice without an id
      const jobs = objectArray(data).filter(item => item.id !== undefined && item.id !== null);
      const relevant = jobs.filter(job => this.isRelevant(job));

      logger.debug(`RemoteOK API returned ${data.length} items, ${relevant.length} relevant`, {
        validJobs: jobs.length,
      });

      return relevant.map(job => this.toPosting(job));
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.tag}`, error);
      return [];
    }
  }

  private isRelevant(job: JsonObject): boolean {
    const position = readString(job, 'position').toLowerCase();
    const tags = Array.isArray(job.tags)
      ? job.tags.filter((tag): tag is string => typeof tag === 'string').join(' ').toLowerCase()
      : '';

    return this.config.remoteOk.relevanceKeywords.some(keyword =>
      position.includes(keyword) || tags.includes(keyword)
    );
  }

  private toPosting(job: JsonObject): RawPosting {
    return {
      jobId: readString(job, 'id'),
      title: readString(job, 'position'),
      company: readString(job, 'company'),
      location: `Remote - ${readString(job, 'location') || 'Worldwide'}`,
      jobType: 'Full-time',
      remote: true,
      postedDate: readString(job, 'date'),
      applyLink: readString(job, 'url'),
      description: readString(job, 'description'),
      salaryMin: readNumber(job, 'salary_min'),
      salaryMax: readNumber(job, 'salary_max'),
      salaryCurrency: 'USD',
    };
  }
}
