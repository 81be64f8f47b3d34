import type { NormalizedCourseUrl } from '../discovery/types.js';

/**
 * - `free`          the pricing API confirmed a 100% discount
 * - `not-free`      the pricing API answered and the coupon is not 100% off
 * - `indeterminate` no usable answer (network, timeout, unreadable body)
 */
export type ValidationOutcome = 'free' | 'not-free' | 'indeterminate';

export interface ValidationVerdict {
  url: NormalizedCourseUrl;
  isFree: boolean;
  outcome: ValidationOutcome;
  /** Whether the verdict came from the cache. */
  cached: boolean;
}
