import { describe, it, expect } from 'vitest';
import { JobFetcherService } from './job-fetcher';
import { JobFamily } from '../families/job-family';
import { FakeSource, makePosting, singlePage, testConfig } from '../__tests__/helpers';

const config = testConfig();
const noWait = { sleep: async () => {}, now: () => new Date('2026-10-18T06:00:00.000Z') };

describe('JobFetcherService', () => {
  it('merges families and drops postings another family already found', async () => {
    const board = new FakeSource(singlePage([
      makePosting({ jobId: '1' }),
      makePosting({ jobId: '2' }),
    ]));
    const remote = new FakeSource(singlePage([makePosting({ jobId: '9' })]), 'Remote Board');

    const families = [
      new JobFamily({ label: 'Data Engineer', searchTerms: ['Data Engineer'] }, [board], config, noWait),
      new JobFamily({ label: 'Analytics Engineer', searchTerms: ['Analytics Engineer'] }, [board, remote], config, noWait),
    ];

    const result = await new JobFetcherService(families).fetchAllJobs();

    expect(result.jobs.map(job => [job.jobId, job.jobFamily])).toEqual([
      ['fake_1', 'Data Engineer'],
      ['fake_2', 'Data Engineer'],
      ['remote_9', 'Analytics Engineer'],
    ]);
    expect(result.byFamily).toEqual({ 'Data Engineer': 2, 'Analytics Engineer': 1 });
    expect(result.bySource).toEqual({ 'Fake Board': 2, 'Remote Board': 1 });
    expect(result.crossFamilyDuplicates).toBe(2);
  });

  it('reports family counts that add up to the merged total', async () => {
    const board = new FakeSource(singlePage([
      makePosting({ jobId: '1' }),
      makePosting({ jobId: '2' }),
    ]));
    const families = [
      new JobFamily({ label: 'Data Engineer', searchTerms: ['Data Engineer'] }, [board], config, noWait),
      new JobFamily({ label: 'Analytics Engineer', searchTerms: ['Analytics Engineer'] }, [board], config, noWait),
    ];

    const result = await new JobFetcherService(families).fetchAllJobs();

    expect(result.byFamily).toEqual({ 'Data Engineer': 2, 'Analytics Engineer': 0 });
    const familyTotal = Object.values(result.byFamily).reduce((sum, count) => sum + count, 0);
    expect(familyTotal).toBe(result.jobs.length);
  });

  it('returns empty totals when no family finds anything', async () => {
    const empty = new FakeSource(() => []);
    const families = [
      new JobFamily({ label: 'Data Engineer', searchTerms: ['Data Engineer'] }, [empty], config, noWait),
    ];

    const result = await new JobFetcherService(families).fetchAllJobs();

    expect(result).toEqual({
      jobs: [],
      byFamily: { 'Data Engineer': 0 },
      bySource: {},
      crossFamilyDuplicates: 0,
    });
  });
});
