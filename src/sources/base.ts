import { RawPosting } from '../types/job';

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource {
  /**
   * Display name, written to the `source` column
   */
  readonly name: string;

  /**
   * Short prefix used to qualify provider-native ids
   */
  readonly tag: string;

  /**
   * Pause between consecutive pages; 0 for sources without a rate limit
   */
  readonly pageDelayMs: number;

  /**
   * Fetches one page of postings for a title.
   * Never rejects: failures and missing credentials resolve to an empty
   * page, which callers treat as the end of results.
   */
  fetchJobs(jobTitle: string, page: number): Promise<RawPosting[]>;
}

/**
 * "JSearch (LinkedIn/Indeed)" -> "jsearch"
 */
export function sourceTag(name: string): string {
  return name.trim().split(/\s+/)[0].toLowerCase();
}

export function qualifyJobId(source: Pick<JobSource, 'tag'>, nativeId: string): string {
  return `${source.tag}_${nativeId}`;
}
