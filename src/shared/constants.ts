// ---------------------------------------------------------------------------
// Course platform
// ---------------------------------------------------------------------------

export const COURSE_PLATFORM = {
  CANONICAL_HOST: 'www.udemy.com',
  ACCEPTED_HOSTS: ['udemy.com', 'www.udemy.com'],
  COURSE_SEGMENT: 'course',
  PRICING_API_BASE: 'https://www.udemy.com/api-2.0/courses',
  PRICING_FIELDS: 'is_paid,price,discounted_price,discount,has_discount',
} as const;

/** Recognised coupon parameter names, highest priority first. */
export const COUPON_PARAM_NAMES = ['couponCode', 'coupon_code', 'coupon'] as const;

export type CouponParamName = (typeof COUPON_PARAM_NAMES)[number];

// ---------------------------------------------------------------------------
// Default operational limits
// ---------------------------------------------------------------------------

export const DEFAULT_LIMITS = {
  REQUEST_TIMEOUT_MS: 30_000,
  VALIDATION_TIMEOUT_MS: 15_000,
  HISTORY_CAPACITY: 2000,
  /** Minimum gap between detail-page requests within one adapter. */
  ITEM_DELAY_MS: 300,
  /** Gap between listing pages within one adapter. */
  PAGE_DELAY_MS: 1000,
  DELIVERY_DELAY_MS: 3000,
  TITLE_MAX_LENGTH: 100,
  RUN_SCHEDULE: '0 */2 * * *',
} as const;

// ---------------------------------------------------------------------------
// Realistic user-agent strings (Chrome, Firefox, Edge on Windows & macOS)
// ---------------------------------------------------------------------------

export const USER_AGENTS: readonly string[] = [
  // Chrome – Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  // Chrome – macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  // Firefox – Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:123.0) Gecko/20100101 Firefox/123.0',
  // Firefox – macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:123.0) Gecko/20100101 Firefox/123.0',
  // Edge – Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36 Edg/122.0.0.0',
] as const;
