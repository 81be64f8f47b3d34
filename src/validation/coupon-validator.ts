/**
 * Coupon validation against Udemy's public course pricing endpoint.
 *
 * A coupon counts as free when any one of three independent signals says
 * so. Anything short of a readable answer is treated as not free and is
 * not cached, so a later call can try again.
 */

import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import { COURSE_PLATFORM, DEFAULT_LIMITS } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import type { HttpClient } from '../discovery/http-client.js';
import type { NormalizedCourseUrl } from '../discovery/types.js';
import { VerdictCache } from './verdict-cache.js';
import type { ValidationOutcome, ValidationVerdict } from './types.js';

const log = getLogger('validation', { component: 'coupon-validator' });

// Each signal is read on its own: a field of the wrong type is dropped
// rather than failing the whole response.
const pricingSchema = z.object({
  discount: z
    .object({
      discount_percent: z.number().nullable().optional().catch(undefined),
      price: z
        .object({
          amount: z.number().nullable().optional().catch(undefined),
        })
        .nullable()
        .optional()
        .catch(undefined),
    })
    .nullable()
    .optional()
    .catch(undefined),
  price: z.string().nullable().optional().catch(undefined),
});

export type PricingResponse = z.infer<typeof pricingSchema>;

export interface CouponValidatorOptions {
  cache?: VerdictCache;
  timeoutMs?: number;
}

/** Builds the pricing endpoint URL for a course slug and coupon. */
export function pricingUrl(url: NormalizedCourseUrl): string {
  const params = new URLSearchParams({
    'fields[course]': COURSE_PLATFORM.PRICING_FIELDS,
    couponCode: url.couponValue,
  });
  return `${COURSE_PLATFORM.PRICING_API_BASE}/${url.slug}/?${params.toString()}`;
}

/**
 * Classifies a pricing response. Returns 'indeterminate' when none of the
 * three price fields can be read.
 */
export function classifyPricing(pricing: PricingResponse): { outcome: ValidationOutcome; reason: string } {
  const percent = pricing.discount?.discount_percent;
  const amount = pricing.discount?.price?.amount;
  const price = pricing.price;

  if (percent === 100) {
    return { outcome: 'free', reason: 'discount_percent is 100' };
  }
  if (amount === 0) {
    return { outcome: 'free', reason: 'discount amount is 0' };
  }
  if (typeof price === 'string' && price.startsWith('Free')) {
    return { outcome: 'free', reason: "price shows 'Free'" };
  }

  const recognised =
    typeof percent === 'number' || typeof amount === 'number' || typeof price === 'string';
  if (!recognised) {
    return { outcome: 'indeterminate', reason: 'no price fields in response' };
  }

  return {
    outcome: 'not-free',
    reason: `discount_percent=${String(percent)}, amount=${String(amount)}, price=${String(price)}`,
  };
}

export class CouponValidator {
  readonly cache: VerdictCache;
  private readonly timeoutMs: number;
  private readonly inFlight = new Map<string, Promise<ValidationVerdict>>();

  constructor(
    private readonly http: HttpClient,
    options: CouponValidatorOptions = {},
  ) {
    this.cache = options.cache ?? new VerdictCache();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LIMITS.VALIDATION_TIMEOUT_MS;
  }

  /** True only when the pricing API positively confirms a free coupon. */
  async validate(url: NormalizedCourseUrl): Promise<boolean> {
    const verdict = await this.classify(url);
    return verdict.isFree;
  }

  /**
   * Full verdict for a URL. Concurrent calls for the same URL share one
   * pricing request.
   */
  async classify(url: NormalizedCourseUrl): Promise<ValidationVerdict> {
    const cached = this.cache.get(url.href);
    if (cached !== undefined) {
      log.debug({ url: url.href, isFree: cached }, 'Verdict cache hit');
      return { url, isFree: cached, outcome: cached ? 'free' : 'not-free', cached: true };
    }

    const pending = this.inFlight.get(url.href);
    if (pending) {
      return pending;
    }

    const request = this.query(url).finally(() => {
      this.inFlight.delete(url.href);
    });
    this.inFlight.set(url.href, request);
    return request;
  }

  private async query(url: NormalizedCourseUrl): Promise<ValidationVerdict> {
    const endpoint = pricingUrl(url);

    let body: unknown;
    try {
      body = await this.http.getJson(endpoint, {
        timeoutMs: this.timeoutMs,
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      log.debug({ url: url.href, error: errorMessage(error) }, 'Pricing request failed, treating as not free');
      return { url, isFree: false, outcome: 'indeterminate', cached: false };
    }

    const parsed = pricingSchema.safeParse(body);
    if (!parsed.success) {
      log.debug({ url: url.href }, 'Unreadable pricing response, treating as not free');
      return { url, isFree: false, outcome: 'indeterminate', cached: false };
    }

    const { outcome, reason } = classifyPricing(parsed.data);
    log.debug({ slug: url.slug, coupon: url.couponValue, outcome, reason }, 'Coupon classified');

    if (outcome === 'indeterminate') {
      return { url, isFree: false, outcome, cached: false };
    }

    const isFree = outcome === 'free';
    this.cache.set(url.href, isFree);
    return { url, isFree, outcome, cached: false };
  }
}
