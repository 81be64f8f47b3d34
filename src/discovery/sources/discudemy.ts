/**
 * Discudemy (discudemy.com) two-step crawler.
 *
 * Listing pages only carry stubs; the Udemy link lives behind a per-course
 * "go" page. Each stub therefore costs one extra request, paced to stay
 * polite with the origin.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../../shared/logger.js';
import { Pacer, sleep } from '../../shared/timing.js';
import { DEFAULT_LIMITS } from '../../shared/constants.js';
import { collapseWhitespace, lastPathSegment, titleFromSlug } from '../../shared/utils.js';
import type { HttpClient } from '../http-client.js';
import type {
  CourseCandidate,
  PacingOptions,
  SourceAdapter,
  SourceFetchFailure,
  SourceFetchResult,
} from '../types.js';
import { HTML_ACCEPT, toFetchFailure } from './source-support.js';

const log = getLogger('discovery', { component: 'discudemy' });

const BASE_URL = 'https://www.discudemy.com';
const LISTING_PAGES = 3;

const SELECTORS = {
  stub: 'a.card-header',
  courseLink: 'div.ui.segment a[href]',
};

interface CourseStub {
  title: string | null;
  slug: string;
}

export class DiscudemySource implements SourceAdapter {
  readonly id = 'discudemy' as const;
  readonly kind = 'list-detail' as const;

  private readonly itemDelayMs: number;
  private readonly pageDelayMs: number;

  constructor(
    private readonly http: HttpClient,
    options: PacingOptions = {},
  ) {
    this.itemDelayMs = options.itemDelayMs ?? DEFAULT_LIMITS.ITEM_DELAY_MS;
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_LIMITS.PAGE_DELAY_MS;
  }

  async fetch(): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const candidates: CourseCandidate[] = [];
    const errors: SourceFetchFailure[] = [];
    const pacer = new Pacer(this.itemDelayMs);
    let requests = 0;

    for (let page = 1; page <= LISTING_PAGES; page++) {
      if (page > 1) {
        await sleep(this.pageDelayMs);
      }

      const listingUrl = `${BASE_URL}/all/${page}`;
      let stubs: CourseStub[];
      try {
        requests++;
        const html = await this.http.getText(listingUrl, { headers: this.headers() });
        stubs = this.extractStubs(html);
      } catch (error) {
        log.warn({ url: listingUrl, err: error }, 'Discudemy listing page failed');
        errors.push(toFetchFailure(error, listingUrl));
        continue;
      }

      log.debug({ url: listingUrl, stubs: stubs.length }, 'Listing page parsed');

      for (const stub of stubs) {
        await pacer.wait();
        const detailUrl = `${BASE_URL}/go/${stub.slug}`;

        try {
          requests++;
          const html = await this.http.getText(detailUrl, { headers: this.headers() });
          const rawUrl = this.extractCourseLink(html);
          if (!rawUrl) {
            log.debug({ url: detailUrl }, 'No course link on detail page');
            continue;
          }

          candidates.push({
            title: stub.title ?? titleFromSlug(stub.slug),
            rawUrl,
            source: this.id,
          });
        } catch (error) {
          log.debug({ url: detailUrl, err: error }, 'Discudemy detail page failed');
          errors.push(toFetchFailure(error, detailUrl));
        }
      }
    }

    const durationMs = Date.now() - startTime;
    log.info({ found: candidates.length, requests, durationMs }, 'Discudemy fetch completed');

    return { source: this.id, candidates, errors, requests, durationMs };
  }

  private headers(): Record<string, string> {
    return {
      'Accept': HTML_ACCEPT,
      'Referer': BASE_URL,
    };
  }

  private extractStubs(html: string): CourseStub[] {
    const $ = cheerio.load(html);
    const stubs: CourseStub[] = [];

    $(SELECTORS.stub).each((_index, element) => {
      const anchor = $(element);
      const slug = lastPathSegment(anchor.attr('href') ?? '');
      if (!slug) return;

      const title = collapseWhitespace(anchor.text());
      stubs.push({ title: title || null, slug });
    });

    return stubs;
  }

  private extractCourseLink(html: string): string | null {
    const $ = cheerio.load(html);
    const href = $(SELECTORS.courseLink).first().attr('href');
    return href ? href.trim() : null;
  }
}
