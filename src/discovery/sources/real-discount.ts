/**
 * Real.Discount (real.discount) JSON listing API.
 *
 * The site exposes its catalogue through a CDN-hosted JSON endpoint, so no
 * HTML parsing is involved: each page of `items` maps directly onto
 * candidates. Sponsored placements are dropped.
 */

import { z } from 'zod';
import { getLogger } from '../../shared/logger.js';
import { sleep } from '../../shared/timing.js';
import { DEFAULT_LIMITS } from '../../shared/constants.js';
import { collapseWhitespace } from '../../shared/utils.js';
import type { HttpClient } from '../http-client.js';
import type {
  CourseCandidate,
  PacingOptions,
  SourceAdapter,
  SourceFetchFailure,
  SourceFetchResult,
} from '../types.js';
import { toFetchFailure } from './source-support.js';

const log = getLogger('discovery', { component: 'real-discount' });

const API_URL = 'https://cdn.real.discount/api/courses';
const PAGE_SIZE = 100;
const SPONSORED_STORE = 'Sponsored';

const pageSchema = z.object({
  items: z.array(z.unknown()),
});

const itemSchema = z.object({
  name: z.string().optional(),
  url: z.string().min(1),
  store: z.string().optional(),
});

export interface RealDiscountOptions extends PacingOptions {
  /** Number of API pages to request. Default: 1 */
  pageCount?: number;
}

export class RealDiscountSource implements SourceAdapter {
  readonly id = 'real-discount' as const;
  readonly kind = 'json-api' as const;

  private readonly pageCount: number;
  private readonly pageDelayMs: number;

  constructor(
    private readonly http: HttpClient,
    options: RealDiscountOptions = {},
  ) {
    this.pageCount = options.pageCount ?? 1;
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_LIMITS.PAGE_DELAY_MS;
  }

  async fetch(): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const candidates: CourseCandidate[] = [];
    const errors: SourceFetchFailure[] = [];
    let requests = 0;

    for (let page = 1; page <= this.pageCount; page++) {
      if (page > 1) {
        await sleep(this.pageDelayMs);
      }

      const pageUrl = this.pageUrl(page);
      let items: unknown[];
      try {
        requests++;
        const body = await this.http.getJson(pageUrl, {
          headers: {
            'Referer': 'https://www.real.discount/',
          },
        });
        items = pageSchema.parse(body).items;
      } catch (error) {
        log.warn({ url: pageUrl, err: error }, 'Real.Discount page failed');
        errors.push(toFetchFailure(error, pageUrl));
        break;
      }

      if (items.length === 0) {
        break;
      }

      candidates.push(...this.extractCandidates(items));
    }

    const durationMs = Date.now() - startTime;
    log.info({ found: candidates.length, requests, durationMs }, 'Real.Discount fetch completed');

    return { source: this.id, candidates, errors, requests, durationMs };
  }

  private pageUrl(page: number): string {
    const params = new URLSearchParams({
      page: String(page),
      limit: String(PAGE_SIZE),
      sortBy: 'sale_start',
      store: 'Udemy',
      freeOnly: 'true',
    });
    return `${API_URL}?${params.toString()}`;
  }

  private extractCandidates(items: unknown[]): CourseCandidate[] {
    const candidates: CourseCandidate[] = [];

    for (const raw of items) {
      const parsed = itemSchema.safeParse(raw);
      if (!parsed.success) {
        log.debug({ issues: parsed.error.issues.length }, 'Skipping malformed Real.Discount item');
        continue;
      }

      const item = parsed.data;
      if (item.store === SPONSORED_STORE) {
        continue;
      }

      const title = item.name ? collapseWhitespace(item.name) : '';
      candidates.push({
        ...(title ? { title } : {}),
        rawUrl: item.url,
        source: this.id,
      });
    }

    return candidates;
  }
}
