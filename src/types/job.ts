/**
 * Posting as returned by a source adapter (before normalization)
 * The id is the provider-native one; qualification happens in the family
 */
export interface RawPosting {
  jobId: string;
  title: string;
  company: string;
  location: string;
  jobType?: string;
  remote: boolean;
  postedDate: string;
  applyLink: string;
  description: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryCurrency?: string;
}

/**
 * Normalized posting schema
 * Every row of the exported CSV has this shape
 */
export interface JobPosting {
  jobId: string;
  title: string;
  company: string;
  location: string;
  remote: boolean;
  jobType: string;
  postedDate: string;
  applyLink: string;
  descriptionSnippet: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryCurrency: string;
  experienceRequired: string;
  source: string;
  scrapedAt: string;
  jobFamily: string;
}

/**
 * Years-of-experience requirement extracted from free text
 * `null` means no requirement was stated
 */
export interface ExperienceRange {
  min: number;
  max: number;
}

export type ExperienceRequirement = ExperienceRange | null;
