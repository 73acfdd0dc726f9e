import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { FashionReportService } from '../../src/application/fashion-report.js';
import { MemoizingCache } from '../../src/application/memoizing-cache.js';
import type { FashionReport } from '../../src/application/payloads.js';
import type { ReportLookup, ReportQuery } from '../../src/application/ports.js';
import { fakeLogger } from '../helpers.js';

// Friday 2024-01-05 08:00 UTC opens week 310.
const OPENED = new Date('2024-01-05T08:00:00Z');

const REPORT: FashionReport = {
  week: 310,
  title: 'Fashion Report Full Details - For Week of 1/5/2024 (Week 310)',
  url: 'https://www.reddit.com/r/ffxiv/comments/abc/fashion_report/',
  imageUrl: null,
  publishedAt: new Date('2024-01-05T09:00:00Z'),
};

const FOUND: ReportLookup = { status: 'found', report: REPORT };
const MISSING: ReportLookup = { status: 'not-yet-available', reason: 'no submission for week 310 yet' };

describe('FashionReportService', () => {
  let fetchReport: Mock<(query: ReportQuery) => Promise<ReportLookup>>;
  let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
  let log: ReturnType<typeof fakeLogger>;
  let service: FashionReportService;

  beforeEach(() => {
    fetchReport = vi.fn<(query: ReportQuery) => Promise<ReportLookup>>();
    sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>().mockResolvedValue(undefined);
    log = fakeLogger();
    service = new FashionReportService({
      source: { fetchReport },
      cache: new MemoizingCache(),
      log,
      maxAttempts: 3,
      retryBaseMs: 1000,
      sleep,
    });
  });

  it('should return the report for the current week', async () => {
    fetchReport.mockResolvedValue(FOUND);

    expect(await service.obtain(OPENED)).toEqual(FOUND);
    expect(fetchReport).toHaveBeenCalledWith({ week: 310, now: OPENED });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry with a linear backoff until the report appears', async () => {
    fetchReport.mockResolvedValueOnce(MISSING).mockResolvedValueOnce(MISSING).mockResolvedValueOnce(FOUND);

    expect(await service.obtain(OPENED)).toEqual(FOUND);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('should give up after the last attempt', async () => {
    fetchReport.mockResolvedValue(MISSING);

    expect(await service.obtain(OPENED)).toEqual(MISSING);
    expect(fetchReport).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith({ week: 310, reason: MISSING.reason }, 'Giving up on fashion report');
  });

  it('should treat source errors as not yet available', async () => {
    fetchReport.mockRejectedValueOnce(new Error('HTTP 503')).mockResolvedValueOnce(FOUND);

    expect(await service.obtain(OPENED)).toEqual(FOUND);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ week: 310, attempt: 1 }),
      'Fashion report lookup failed',
    );
  });

  it('should report the last error as the reason', async () => {
    fetchReport.mockRejectedValue(new Error('HTTP 503'));

    expect(await service.obtain(OPENED)).toEqual({ status: 'not-yet-available', reason: 'HTTP 503' });
  });

  it('should cache a found report for the rest of the week', async () => {
    fetchReport.mockResolvedValue(FOUND);

    await service.obtain(OPENED);
    await service.obtain(new Date('2024-01-07T12:00:00Z'));
    expect(fetchReport).toHaveBeenCalledTimes(1);
  });

  it('should look up again after a reset', async () => {
    fetchReport.mockResolvedValue(FOUND);

    await service.obtain(OPENED);
    expect(service.reset()).toBe(true);
    expect(log.info).toHaveBeenCalledWith({ cleared: true }, 'Fashion report cache reset');
    expect(service.reset()).toBe(false);

    await service.obtain(OPENED);
    expect(fetchReport).toHaveBeenCalledTimes(2);
  });

  it('should stop retrying once aborted', async () => {
    const controller = new AbortController();
    fetchReport.mockResolvedValue(MISSING);
    sleep.mockImplementation(async () => {
      controller.abort();
    });

    expect(await service.obtain(OPENED, controller.signal)).toEqual(MISSING);
    expect(fetchReport).toHaveBeenCalledTimes(1);
  });

  it('should not look up at all when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await service.obtain(OPENED, controller.signal)).toEqual({
      status: 'not-yet-available',
      reason: 'lookup aborted',
    });
    expect(fetchReport).not.toHaveBeenCalled();
  });
});
