import type { BaseLogger } from 'pino';
import { fashionReportWeek } from '../domain/index.js';
import type { CachedFunction, MemoizingCache } from './memoizing-cache.js';
import type { ReportLookup, ReportQuery, ReportSource } from './ports.js';
import { abortableSleep, type Sleep } from './sleep.js';

export const FASHION_REPORT_CACHE_KEY = 'fashion-report.lookup';

export interface FashionReportServiceOptions {
  source: ReportSource;
  cache: MemoizingCache;
  log: BaseLogger;
  /** Lookups per `obtain()` call. Defaults to 5. */
  maxAttempts?: number;
  /** Wait before retry n is `retryBaseMs × n`. Defaults to one minute. */
  retryBaseMs?: number;
  sleep?: Sleep;
}

/**
 * The weekly Fashion Report, fetched once per week and kept until reset.
 *
 * Lookups that come back empty are never cached, so every retry asks the
 * source again.
 */
export class FashionReportService {
  private readonly lookup: CachedFunction<ReportQuery, ReportLookup>;
  private readonly log: BaseLogger;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly sleep: Sleep;

  constructor(options: FashionReportServiceOptions) {
    this.log = options.log;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.retryBaseMs = options.retryBaseMs ?? 60_000;
    this.sleep = options.sleep ?? abortableSleep;

    this.lookup = options.cache.define(
      FASHION_REPORT_CACHE_KEY,
      (query: ReportQuery) => options.source.fetchReport(query),
      {
        ignore: ['now'],
        retain: (result) => result.status === 'found',
      },
    );
  }

  /**
   * Looks up the report for the week containing `now`, retrying with a
   * linear backoff. Returns the last not-yet-available result once the
   * attempts run out or `signal` aborts.
   */
  async obtain(now: Date, signal?: AbortSignal): Promise<ReportLookup> {
    const week = fashionReportWeek(now);
    let result: ReportLookup = { status: 'not-yet-available', reason: 'lookup aborted' };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) break;

      try {
        result = await this.lookup.call({ week, now });
      } catch (err: unknown) {
        this.log.warn({ err, week, attempt }, 'Fashion report lookup failed');
        result = { status: 'not-yet-available', reason: err instanceof Error ? err.message : String(err) };
      }

      if (result.status === 'found') {
        this.log.info({ week, attempt }, 'Fashion report found');
        return result;
      }

      if (attempt < this.maxAttempts) {
        const delayMs = this.retryBaseMs * attempt;
        this.log.info({ week, attempt, delay_ms: delayMs, reason: result.reason }, 'Fashion report not available yet, retrying');
        await this.sleep(delayMs, signal);
      }
    }

    this.log.warn({ week, reason: result.reason }, 'Giving up on fashion report');
    return result;
  }

  /** Forgets every cached report. Returns whether anything was cached. */
  reset(): boolean {
    const cleared = this.lookup.invalidate();
    this.log.info({ cleared }, 'Fashion report cache reset');
    return cleared;
  }
}
