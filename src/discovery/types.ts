/**
 * Type definitions for the discovery module.
 * These types define the shape of data flowing from the source adapters
 * through normalization into the aggregator.
 */

import type { CouponParamName } from '../shared/constants.js';

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

/** The origins the scout knows how to read. */
export type SourceId = 'real-discount' | 'discudemy' | 'coursevania' | 'udemy-freebies';

/** Fetch strategy of a source. Closed set; dispatch is static. */
export type SourceKind = 'json-api' | 'list-detail' | 'ajax-token' | 'single-page';

/** Pacing applied by adapters that issue a sequence of requests. */
export interface PacingOptions {
  /** Minimum gap between consecutive detail / follow-up requests in ms. */
  itemDelayMs?: number;
  /** Gap between listing pages in ms. */
  pageDelayMs?: number;
}

// ---------------------------------------------------------------------------
// Candidates
// ---------------------------------------------------------------------------

/** A raw listing as advertised by a source, before normalization. */
export interface CourseCandidate {
  /** Title as discovered; may be a placeholder or truncated. */
  readonly title?: string;
  /** Course URL exactly as found on the source. */
  readonly rawUrl: string;
  readonly source: SourceId;
}

/** Canonical form of a course URL carrying exactly one coupon. */
export interface NormalizedCourseUrl {
  readonly host: string;
  /** Always `/course/<slug>`. */
  readonly path: string;
  readonly slug: string;
  readonly couponParam: CouponParamName;
  readonly couponValue: string;
  /** Full canonical URL; also the dedup and cache key. */
  readonly href: string;
}

// ---------------------------------------------------------------------------
// Adapter results
// ---------------------------------------------------------------------------

export interface SourceFetchFailure {
  /** URL that failed, when the failure is tied to one request. */
  url?: string;
  message: string;
  code: string;
}

export interface SourceFetchResult {
  source: SourceId;
  candidates: CourseCandidate[];
  errors: SourceFetchFailure[];
  /** Number of HTTP requests issued. */
  requests: number;
  durationMs: number;
}

/**
 * Interface all source adapters implement. `fetch()` resolves even when
 * the origin is unreachable: failures land in `errors`.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  readonly kind: SourceKind;
  fetch(): Promise<SourceFetchResult>;
}
