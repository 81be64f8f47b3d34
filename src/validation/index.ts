export type { ValidationOutcome, ValidationVerdict } from './types.js';
export { CouponValidator, classifyPricing, pricingUrl } from './coupon-validator.js';
export type { CouponValidatorOptions, PricingResponse } from './coupon-validator.js';
export { VerdictCache } from './verdict-cache.js';
