import { JobPosting, RawPosting } from '../types/job';

export const DESCRIPTION_SNIPPET_LENGTH = 500;

// Counted in code points so a surrogate pair is never split.
export function descriptionSnippet(description: string): string {
  const chars = Array.from(description);
  return chars.length > DESCRIPTION_SNIPPET_LENGTH
    ? `${chars.slice(0, DESCRIPTION_SNIPPET_LENGTH).join('')}...`
    : description;
}

export interface NormalizeContext {
  qualifiedId: string;
  source: string;
  jobFamily: string;
  experienceRequired: string;
  scrapedAt: Date;
}

/**
 * Maps an adapter posting onto the exported row shape
 */
export function normalizePosting(posting: RawPosting, context: NormalizeContext): JobPosting {
  return {
    jobId: context.qualifiedId,
    title: posting.title,
    company: posting.company,
    location: posting.location,
    remote: posting.remote,
    jobType: posting.jobType || 'Full-time',
    postedDate: posting.postedDate,
    applyLink: posting.applyLink,
    descriptionSnippet: descriptionSnippet(posting.description),
    salaryMin: posting.salaryMin,
    salaryMax: posting.salaryMax,
    salaryCurrency: posting.salaryCurrency || 'USD',
    experienceRequired: context.experienceRequired,
    source: context.source,
    scrapedAt: context.scrapedAt.toISOString(),
    jobFamily: context.jobFamily,
  };
}
