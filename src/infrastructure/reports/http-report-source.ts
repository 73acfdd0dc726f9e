import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { DAY_MS, TransportError } from '../../domain/index.js';
import type { ReportLookup, ReportQuery, ReportSource } from '../../application/ports.js';

export const FASHION_REPORT_TITLE_RE =
  /Fashion Report - Full Details - For Week of (?<date>[0-9]{1,2}\/[0-9]{1,2}\/[0-9]{4}) \(Week (?<week>[0-9]{3,})\)/;

/** Posts older than this belong to an earlier week. */
export const MAX_REPORT_AGE_MS = 7 * DAY_MS;

const IMAGE_RE = /\.(png|jpe?g|gif|webp)(\?.*)?$/i;

export const submissionListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({
      data: z.object({
        title: z.string(),
        permalink: z.string(),
        url: z.string().optional(),
        created_utc: z.number(),
      }),
    })),
  }),
});

export type SubmissionListing = z.infer<typeof submissionListingSchema>;

export interface HttpReportSourceOptions {
  url: string;
  userAgent: string;
  log: BaseLogger;
}

/** Picks this week's report out of a submission listing. */
export function findReport(listing: SubmissionListing, query: ReportQuery): ReportLookup {
  for (const { data: post } of listing.data.children) {
    const match = FASHION_REPORT_TITLE_RE.exec(post.title);
    if (!match?.groups) continue;
    if (Number(match.groups['week']) !== query.week) continue;

    const publishedAt = new Date(post.created_utc * 1000);
    if (query.now.getTime() - publishedAt.getTime() >= MAX_REPORT_AGE_MS) continue;

    return {
      status: 'found',
      report: {
        week: query.week,
        title: post.title,
        url: `https://www.reddit.com${post.permalink}`,
        imageUrl: post.url !== undefined && IMAGE_RE.test(post.url) ? post.url : null,
        publishedAt,
      },
    };
  }

  return { status: 'not-yet-available', reason: `no submission for week ${query.week} yet` };
}

/**
 * Reads the report author's public submission listing as JSON.
 *
 * HTTP and schema failures throw; a listing without this week's post is a
 * not-yet-available result.
 */
export class HttpReportSource implements ReportSource {
  constructor(private readonly options: HttpReportSourceOptions) {}

  async fetchReport(query: ReportQuery): Promise<ReportLookup> {
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.options.userAgent,
        },
      });
    } catch (err: unknown) {
      throw new TransportError('Fetching report listing failed', null, null, { cause: err });
    }

    if (!response.ok) {
      throw new TransportError(`Fetching report listing: HTTP ${response.status}`, response.status);
    }

    const parsed = submissionListingSchema.safeParse(await response.json());
    if (!parsed.success) {
      this.options.log.warn({ issues: parsed.error.issues.length }, 'Report listing has an unexpected shape');
      throw new TransportError('Report listing has an unexpected shape', response.status);
    }

    const result = findReport(parsed.data, query);
    this.options.log.debug({ week: query.week, status: result.status }, 'Report listing checked');
    return result;
  }
}
