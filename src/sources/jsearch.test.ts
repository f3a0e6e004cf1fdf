import { describe, it, expect, vi, beforeEach } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { JSearchSource } from './jsearch';
import { testConfig } from '../__tests__/helpers';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('JSearchSource', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('derives its tag from the display name', () => {
    const source = new JSearchSource(testConfig());
    expect(source.tag).toBe('jsearch');
    expect(source.pageDelayMs).toBe(1000);
  });

  it('returns an empty page without calling the API when no key is configured', async () => {
    const source = new JSearchSource(testConfig());

    await expect(source.fetchJobs('Data Engineer', 1)).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('queries the search endpoint and maps the response', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      status: 'OK',
      data: [{
        job_id: 'abc123',
        job_title: 'Data Engineer',
        employer_name: 'Acme',
        job_city: 'Austin',
        job_state: 'TX',
        job_employment_type: 'FULLTIME',
        job_is_remote: false,
        job_posted_at_datetime_utc: '2026-10-01T00:00:00.000Z',
        job_apply_link: 'https://example.com/apply',
        job_description: '3-5 years of experience',
        job_min_salary: 120000,
        job_max_salary: 150000,
        job_salary_currency: 'USD',
      }],
    }));

    const source = new JSearchSource(testConfig({ RAPIDAPI_KEY: 'test-key' }));
    const postings = await source.fetchJobs('Data Engineer', 2);

    expect(postings).toEqual([{
      jobId: 'abc123',
      title: 'Data Engineer',
      company: 'Acme',
      location: 'Austin, TX',
      jobType: 'FULLTIME',
      remote: false,
      postedDate: '2026-10-01T00:00:00.000Z',
      applyLink: 'https://example.com/apply',
      description: '3-5 years of experience',
      salaryMin: 120000,
      salaryMax: 150000,
      salaryCurrency: 'USD',
    }]);

    const [url, init] = fetchMock.mock.calls[0];
    const parsed = new URL(String(url));
    expect(parsed.origin + parsed.pathname).toBe('https://jsearch.p.rapidapi.com/search');
    expect(parsed.searchParams.get('query')).toBe('Data Engineer in United States');
    expect(parsed.searchParams.get('page')).toBe('2');
    expect(parsed.searchParams.get('num_pages')).toBe('1');
    expect(parsed.searchParams.get('date_posted')).toBe('week');
    expect(init).toMatchObject({
      headers: {
        'X-RapidAPI-Key': 'test-key',
        'X-RapidAPI-Host': 'jsearch.p.rapidapi.com',
      },
      timeout: 30000,
    });
  });

  it('leaves absent salary fields undefined', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      data: [{ job_id: 'x', job_title: 'Data Engineer', job_min_salary: null }],
    }));

    const source = new JSearchSource(testConfig({ RAPIDAPI_KEY: 'test-key' }));
    const [posting] = await source.fetchJobs('Data Engineer', 1);

    expect(posting.salaryMin).toBeUndefined();
    expect(posting.salaryMax).toBeUndefined();
    expect(posting.salaryCurrency).toBeUndefined();
  });

  it('swallows HTTP errors as an empty page', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: 'Too many requests' }, 429));

    const source = new JSearchSource(testConfig({ RAPIDAPI_KEY: 'test-key' }));
    await expect(source.fetchJobs('Data Engineer', 1)).resolves.toEqual([]);
  });

  it('swallows transport errors as an empty page', async () => {
    fetchMock.mockRejectedValue(new Error('socket hang up'));

    const source = new JSearchSource(testConfig({ RAPIDAPI_KEY: 'test-key' }));
    await expect(source.fetchJobs('Data Engineer', 1)).resolves.toEqual([]);
  });
});
