/**
 * Course URL canonicalization.
 *
 * Reduces any advertised Udemy link to `https://www.udemy.com/course/<slug>`
 * plus a single coupon parameter. Everything else in the query string
 * (tracking, referral, affiliate ids) is discarded.
 */

import {
  COUPON_PARAM_NAMES,
  COURSE_PLATFORM,
  type CouponParamName,
} from '../shared/constants.js';
import type { NormalizedCourseUrl } from './types.js';

const ACCEPTED_HOSTS: ReadonlySet<string> = new Set(COURSE_PLATFORM.ACCEPTED_HOSTS);

interface CouponMatch {
  name: CouponParamName;
  value: string;
}

/**
 * Picks the coupon parameter by priority. Parameter names are compared
 * case-insensitively because some sources publish `couponcode`.
 */
function findCoupon(params: URLSearchParams): CouponMatch | null {
  const entries = [...params.entries()];

  for (const name of COUPON_PARAM_NAMES) {
    const wanted = name.toLowerCase();
    for (const [key, value] of entries) {
      if (key.toLowerCase() !== wanted) continue;
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return { name, value: trimmed };
      }
    }
  }

  return null;
}

/**
 * Canonicalizes a raw course URL. Returns null when the input is not a
 * course URL on the target platform or carries no usable coupon.
 */
export function normalizeCourseUrl(rawUrl: string | null | undefined): NormalizedCourseUrl | null {
  if (!rawUrl || rawUrl.trim().length === 0) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(rawUrl.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return null;
  }
  if (!ACCEPTED_HOSTS.has(parsed.hostname.toLowerCase())) {
    return null;
  }

  const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
  const slug = segments[1];
  if (segments[0] !== COURSE_PLATFORM.COURSE_SEGMENT || !slug) {
    return null;
  }

  const coupon = findCoupon(parsed.searchParams);
  if (!coupon) {
    return null;
  }

  const path = `/${COURSE_PLATFORM.COURSE_SEGMENT}/${slug}`;
  const query = new URLSearchParams({ [coupon.name]: coupon.value }).toString();

  return {
    host: COURSE_PLATFORM.CANONICAL_HOST,
    path,
    slug,
    couponParam: coupon.name,
    couponValue: coupon.value,
    href: `https://${COURSE_PLATFORM.CANONICAL_HOST}${path}?${query}`,
  };
}
