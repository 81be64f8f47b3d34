/**
 * Source registry.
 *
 * The set of origins is closed: one adapter per SourceId, created in a fixed
 * order. That order is also the merge priority the aggregator uses when two
 * sources advertise the same course.
 */

import { getLogger } from '../../shared/logger.js';
import type { HttpClient } from '../http-client.js';
import type { PacingOptions, SourceAdapter, SourceId, SourceKind } from '../types.js';
import { RealDiscountSource } from './real-discount.js';
import { DiscudemySource } from './discudemy.js';
import { CourseVaniaSource } from './coursevania.js';
import { UdemyFreebiesSource } from './udemy-freebies.js';

const log = getLogger('discovery', { component: 'source-registry' });

/** Merge priority, highest first. */
export const SOURCE_ORDER: readonly SourceId[] = [
  'real-discount',
  'discudemy',
  'coursevania',
  'udemy-freebies',
];

export const SOURCE_KINDS: Readonly<Record<SourceId, SourceKind>> = {
  'real-discount': 'json-api',
  'discudemy': 'list-detail',
  'coursevania': 'ajax-token',
  'udemy-freebies': 'single-page',
};

export interface SourceRegistryOptions extends PacingOptions {
  /** Pages requested from the JSON API. */
  apiPageCount?: number;
  /** Restrict the run to these sources; all by default. */
  enabled?: readonly SourceId[];
}

function createSourceAdapter(
  id: SourceId,
  http: HttpClient,
  options: SourceRegistryOptions,
): SourceAdapter {
  const pacing: PacingOptions = {
    ...(options.itemDelayMs !== undefined ? { itemDelayMs: options.itemDelayMs } : {}),
    ...(options.pageDelayMs !== undefined ? { pageDelayMs: options.pageDelayMs } : {}),
  };

  switch (id) {
    case 'real-discount':
      return new RealDiscountSource(http, {
        ...pacing,
        ...(options.apiPageCount !== undefined ? { pageCount: options.apiPageCount } : {}),
      });
    case 'discudemy':
      return new DiscudemySource(http, pacing);
    case 'coursevania':
      return new CourseVaniaSource(http, pacing);
    case 'udemy-freebies':
      return new UdemyFreebiesSource(http);
  }
}

/**
 * Creates the adapters for every enabled source, in merge-priority order.
 */
export function createSourceAdapters(
  http: HttpClient,
  options: SourceRegistryOptions = {},
): SourceAdapter[] {
  const enabled = new Set(options.enabled ?? SOURCE_ORDER);
  const adapters = SOURCE_ORDER.filter((id) => enabled.has(id)).map((id) =>
    createSourceAdapter(id, http, options),
  );

  log.debug({ sources: adapters.map((a) => a.id) }, 'Source adapters created');
  return adapters;
}

export { RealDiscountSource } from './real-discount.js';
export { DiscudemySource } from './discudemy.js';
export { CourseVaniaSource } from './coursevania.js';
export { UdemyFreebiesSource } from './udemy-freebies.js';
