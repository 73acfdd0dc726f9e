import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  HttpReportSource,
  findReport,
  type SubmissionListing,
} from '../../src/infrastructure/reports/http-report-source.js';
import { TransportError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const NOW = new Date('2024-01-05T10:00:00Z');

function post(title: string, createdUtc: number, url?: string) {
  return { data: { title, permalink: '/r/ffxiv/comments/abc/fashion_report/', created_utc: createdUtc, ...(url ? { url } : {}) } };
}

function listing(...children: ReturnType<typeof post>[]): SubmissionListing {
  return { data: { children } };
}

const WEEK_310 = 'Fashion Report - Full Details - For Week of 1/5/2024 (Week 310)';

describe('findReport', () => {
  it('finds the post for the requested week', () => {
    const result = findReport(
      listing(post('Something else', 1704445200), post(WEEK_310, 1704445200, 'https://i.redd.it/abc.png')),
      { week: 310, now: NOW },
    );

    expect(result).toEqual({
      status: 'found',
      report: {
        week: 310,
        title: WEEK_310,
        url: 'https://www.reddit.com/r/ffxiv/comments/abc/fashion_report/',
        imageUrl: 'https://i.redd.it/abc.png',
        publishedAt: new Date('2024-01-05T09:00:00Z'),
      },
    });
  });

  it('leaves the image out when the link is not an image', () => {
    const result = findReport(listing(post(WEEK_310, 1704445200, 'https://www.reddit.com/gallery/abc')), { week: 310, now: NOW });
    expect(result.status === 'found' && result.report.imageUrl).toBeNull();
  });

  it('ignores posts for other weeks', () => {
    const result = findReport(
      listing(post('Fashion Report - Full Details - For Week of 12/29/2023 (Week 309)', 1703840400)),
      { week: 310, now: NOW },
    );
    expect(result).toEqual({ status: 'not-yet-available', reason: 'no submission for week 310 yet' });
  });

  it('ignores posts older than a week', () => {
    const result = findReport(listing(post(WEEK_310, 1703754000)), { week: 310, now: NOW });
    expect(result.status).toBe('not-yet-available');
  });
});

describe('HttpReportSource', () => {
  let mockFetch: Mock<(input: string, init?: RequestInit) => Promise<Response>>;
  let source: HttpReportSource;

  beforeEach(() => {
    mockFetch = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
    vi.stubGlobal('fetch', mockFetch);
    source = new HttpReportSource({
      url: 'https://reports.test/submitted.json',
      userAgent: 'reset-herald-test/1.0',
      log: fakeLogger(),
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the listing with its user agent', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify(listing(post(WEEK_310, 1704445200)))));

    const result = await source.fetchReport({ week: 310, now: NOW });

    expect(result.status).toBe('found');
    expect(mockFetch).toHaveBeenCalledWith('https://reports.test/submitted.json', {
      headers: { Accept: 'application/json', 'User-Agent': 'reset-herald-test/1.0' },
    });
  });

  it('throws on HTTP errors', async () => {
    mockFetch.mockResolvedValue(new Response('busy', { status: 503 }));
    await expect(source.fetchReport({ week: 310, now: NOW })).rejects.toThrow('Fetching report listing: HTTP 503');
  });

  it('throws on an unexpected listing shape', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify({ kind: 'Listing' })));
    await expect(source.fetchReport({ week: 310, now: NOW })).rejects.toThrow(TransportError);
  });

  it('wraps network errors', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));
    await expect(source.fetchReport({ week: 310, now: NOW })).rejects.toThrow('Fetching report listing failed');
  });
});
