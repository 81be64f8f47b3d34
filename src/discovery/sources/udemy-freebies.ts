/**
 * UdemyFreebies (udemyfreebies.com) single-page scraper.
 *
 * Every Udemy link on the listing page is a candidate; the anchor text is
 * the only title available.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../../shared/logger.js';
import { DEFAULT_LIMITS } from '../../shared/constants.js';
import { collapseWhitespace, truncate } from '../../shared/utils.js';
import type { HttpClient } from '../http-client.js';
import type {
  CourseCandidate,
  SourceAdapter,
  SourceFetchFailure,
  SourceFetchResult,
} from '../types.js';
import { HTML_ACCEPT, toFetchFailure } from './source-support.js';

const log = getLogger('discovery', { component: 'udemy-freebies' });

const PAGE_URL = 'https://www.udemyfreebies.com/free-udemy-courses';
const MAX_LINKS = 30;
const PLACEHOLDER_TITLE = 'Udemy Course';

export class UdemyFreebiesSource implements SourceAdapter {
  readonly id = 'udemy-freebies' as const;
  readonly kind = 'single-page' as const;

  constructor(private readonly http: HttpClient) {}

  async fetch(): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const candidates: CourseCandidate[] = [];
    const errors: SourceFetchFailure[] = [];

    try {
      const html = await this.http.getText(PAGE_URL, { headers: { Accept: HTML_ACCEPT } });
      candidates.push(...this.extractCandidates(html));
    } catch (error) {
      log.warn({ url: PAGE_URL, err: error }, 'UdemyFreebies page failed');
      errors.push(toFetchFailure(error, PAGE_URL));
    }

    const durationMs = Date.now() - startTime;
    log.info({ found: candidates.length, durationMs }, 'UdemyFreebies fetch completed');

    return { source: this.id, candidates, errors, requests: 1, durationMs };
  }

  private extractCandidates(html: string): CourseCandidate[] {
    const $ = cheerio.load(html);
    const candidates: CourseCandidate[] = [];

    $('a[href*="udemy.com"]')
      .slice(0, MAX_LINKS)
      .each((_index, element) => {
        const anchor = $(element);
        const rawUrl = anchor.attr('href')?.trim();
        if (!rawUrl) return;

        const text = collapseWhitespace(anchor.text());
        candidates.push({
          title: truncate(text || PLACEHOLDER_TITLE, DEFAULT_LIMITS.TITLE_MAX_LENGTH),
          rawUrl,
          source: this.id,
        });
      });

    return candidates;
  }
}
