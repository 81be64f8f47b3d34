/**
 * CourseVania (coursevania.com) crawler.
 *
 * The course grid is rendered by a WordPress AJAX action guarded by a
 * per-session nonce embedded in the courses page. The flow is:
 *   1. GET the courses page and pull the `load_content` nonce out of it
 *   2. GET admin-ajax.php with the nonce to receive the grid HTML
 *   3. GET each grid entry's detail page and pick its Udemy link
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { getLogger } from '../../shared/logger.js';
import { Pacer } from '../../shared/timing.js';
import { DEFAULT_LIMITS } from '../../shared/constants.js';
import { SourceFetchError } from '../../shared/errors.js';
import {
  collapseWhitespace,
  lastPathSegment,
  resolveHref,
  titleFromSlug,
} from '../../shared/utils.js';
import type { HttpClient } from '../http-client.js';
import { normalizeCourseUrl } from '../url-normalizer.js';
import type {
  CourseCandidate,
  PacingOptions,
  SourceAdapter,
  SourceFetchFailure,
  SourceFetchResult,
} from '../types.js';
import { HTML_ACCEPT, toFetchFailure } from './source-support.js';

const log = getLogger('discovery', { component: 'coursevania' });

const COURSES_URL = 'https://coursevania.com/courses/';
const AJAX_URL = 'https://coursevania.com/wp-admin/admin-ajax.php';
const NONCE_PATTERN = /load_content":"(.*?)"/;
/** Detail pages visited per run. */
const MAX_ENTRIES = 20;

const SELECTORS = {
  gridEntry: 'div.stm_lms_courses__single--title',
  entryTitle: 'h5',
  entryLink: 'a[href]',
  courseLink: 'a[href*="udemy.com"]',
};

const gridSchema = z.object({
  content: z.string(),
});

interface GridEntry {
  title: string | null;
  detailUrl: string;
}

export class CourseVaniaSource implements SourceAdapter {
  readonly id = 'coursevania' as const;
  readonly kind = 'ajax-token' as const;

  private readonly itemDelayMs: number;

  constructor(
    private readonly http: HttpClient,
    options: PacingOptions = {},
  ) {
    this.itemDelayMs = options.itemDelayMs ?? DEFAULT_LIMITS.ITEM_DELAY_MS;
  }

  async fetch(): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const candidates: CourseCandidate[] = [];
    const errors: SourceFetchFailure[] = [];
    const pacer = new Pacer(this.itemDelayMs);
    let requests = 0;

    const finish = (): SourceFetchResult => {
      const durationMs = Date.now() - startTime;
      log.info({ found: candidates.length, requests, durationMs }, 'CourseVania fetch completed');
      return { source: this.id, candidates, errors, requests, durationMs };
    };

    // Step 1: session nonce
    let nonce: string;
    try {
      await pacer.wait();
      requests++;
      const page = await this.http.getText(COURSES_URL, { headers: { Accept: HTML_ACCEPT } });
      nonce = this.extractNonce(page);
    } catch (error) {
      log.warn({ url: COURSES_URL, err: error }, 'CourseVania nonce step failed');
      errors.push(toFetchFailure(error, COURSES_URL));
      return finish();
    }

    // Step 2: course grid
    let entries: GridEntry[];
    try {
      await pacer.wait();
      requests++;
      const body = await this.http.getJson(AJAX_URL, {
        searchParams: {
          template: 'courses/grid',
          args: JSON.stringify({ posts_per_page: '100' }),
          action: 'stm_lms_load_content',
          sort: 'date_high',
          nonce,
        },
        headers: { Referer: COURSES_URL },
      });
      entries = this.extractEntries(gridSchema.parse(body).content);
    } catch (error) {
      log.warn({ url: AJAX_URL, err: error }, 'CourseVania grid step failed');
      errors.push(toFetchFailure(error, AJAX_URL));
      return finish();
    }

    log.debug({ entries: entries.length }, 'Course grid parsed');

    // Step 3: detail pages
    for (const entry of entries.slice(0, MAX_ENTRIES)) {
      await pacer.wait();

      try {
        requests++;
        const html = await this.http.getText(entry.detailUrl, {
          headers: { Accept: HTML_ACCEPT, Referer: COURSES_URL },
        });
        const rawUrl = this.extractCourseLink(html);
        if (!rawUrl) {
          log.debug({ url: entry.detailUrl }, 'No Udemy link on detail page');
          continue;
        }

        candidates.push({
          title: entry.title ?? titleFromSlug(lastPathSegment(entry.detailUrl)),
          rawUrl,
          source: this.id,
        });
      } catch (error) {
        log.debug({ url: entry.detailUrl, err: error }, 'CourseVania detail page failed');
        errors.push(toFetchFailure(error, entry.detailUrl));
      }
    }

    return finish();
  }

  private extractNonce(html: string): string {
    const nonce = NONCE_PATTERN.exec(html)?.[1];
    if (!nonce) {
      throw new SourceFetchError('Security nonce not found on courses page', 'NONCE_NOT_FOUND', this.id);
    }
    return nonce;
  }

  private extractEntries(gridHtml: string): GridEntry[] {
    const $ = cheerio.load(gridHtml);
    const entries: GridEntry[] = [];

    $(SELECTORS.gridEntry).each((_index, element) => {
      const entry = $(element);
      const href = entry.find(SELECTORS.entryLink).first().attr('href');
      const detailUrl = href ? resolveHref(href, COURSES_URL) : null;
      if (!detailUrl) return;

      const title = collapseWhitespace(entry.find(SELECTORS.entryTitle).first().text());
      entries.push({ title: title || null, detailUrl });
    });

    return entries;
  }

  /** First Udemy link that carries a usable coupon, else the first Udemy link. */
  private extractCourseLink(html: string): string | null {
    const $ = cheerio.load(html);
    const links = $(SELECTORS.courseLink)
      .map((_index, element) => $(element).attr('href')?.trim() ?? '')
      .get()
      .filter((href) => href.length > 0);

    return links.find((href) => normalizeCourseUrl(href) !== null) ?? links[0] ?? null;
  }
}
