import { Config, loadConfig } from '../config';
import { JobFamilyDefinition } from '../config/job-families';
import { JobSource, sourceTag } from '../sources/base';
import { JobPosting, RawPosting } from '../types/job';

export function makePosting(overrides: Partial<RawPosting> = {}): RawPosting {
  return {
    jobId: '1',
    title: 'Data Engineer',
    company: 'Acme',
    location: 'Austin, TX',
    jobType: 'Full-time',
    remote: false,
    postedDate: '2026-10-01T00:00:00.000Z',
    applyLink: 'https://example.com/apply/1',
    description: 'We need 3-5 years of experience.',
    ...overrides,
  };
}

export function makeJob(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    jobId: 'fake_1',
    title: 'Data Engineer',
    company: 'Acme',
    location: 'Austin, TX',
    remote: false,
    jobType: 'Full-time',
    postedDate: '2026-10-01T00:00:00.000Z',
    applyLink: 'https://example.com/apply/1',
    descriptionSnippet: 'We need 3-5 years of experience.',
    salaryCurrency: 'USD',
    experienceRequired: '3-7 years',
    source: 'Fake Board',
    scrapedAt: '2026-10-18T06:00:00.000Z',
    jobFamily: 'Data Engineer',
    ...overrides,
  };
}

export function testConfig(
  env: NodeJS.ProcessEnv = {},
  jobFamilies?: readonly JobFamilyDefinition[]
): Config {
  const config = loadConfig(env);
  return jobFamilies ? { ...config, jobFamilies } : config;
}

type PageHandler = (jobTitle: string, page: number) => RawPosting[];

/**
 * In-memory source: pages come from a handler, every call is recorded
 */
export class FakeSource implements JobSource {
  readonly tag: string;
  readonly calls: Array<{ jobTitle: string; page: number }> = [];

  constructor(
    private handler: PageHandler,
    readonly name: string = 'Fake Board',
    readonly pageDelayMs: number = 0
  ) {
    this.tag = sourceTag(name);
  }

  async fetchJobs(jobTitle: string, page: number): Promise<RawPosting[]> {
    this.calls.push({ jobTitle, page });
    return this.handler(jobTitle, page);
  }
}

export function singlePage(postings: RawPosting[]): PageHandler {
  return (_jobTitle, page) => (page === 1 ? postings : []);
}
