import type { Env } from '../env.js';
import type { HttpClient } from '../discovery/http-client.js';
import { createSourceAdapters, type SourceRegistryOptions } from '../discovery/sources/index.js';
import { CouponValidator } from '../validation/index.js';
import type { TypedEventEmitter } from '../shared/events.js';
import { CourseAggregator } from './aggregator.js';
import { HistoryCache } from './history-cache.js';

export { CourseAggregator } from './aggregator.js';
export type { AggregatorOptions } from './aggregator.js';
export { HistoryCache } from './history-cache.js';
export type {
  ConfirmedCourse,
  PipelineRunResult,
  PipelineRunner,
  RunCounts,
  RunTrigger,
  SourceFailureNote,
} from './types.js';

export type PipelineConfig = Pick<
  Env,
  'API_PAGE_COUNT' | 'HISTORY_CAPACITY' | 'VALIDATION_TIMEOUT_MS' | 'VALIDATE_COUPONS'
>;

export interface PipelineDependencies {
  http: HttpClient;
  events?: TypedEventEmitter;
  /** Overrides for source pacing; production uses the adapters' defaults. */
  sources?: Omit<SourceRegistryOptions, 'apiPageCount'>;
}

/** Wires adapters, validator and history into a ready aggregator. */
export function createPipeline(config: PipelineConfig, deps: PipelineDependencies): CourseAggregator {
  const adapters = createSourceAdapters(deps.http, {
    ...deps.sources,
    apiPageCount: config.API_PAGE_COUNT,
  });
  const validator = new CouponValidator(deps.http, { timeoutMs: config.VALIDATION_TIMEOUT_MS });
  const history = new HistoryCache(config.HISTORY_CAPACITY);

  return new CourseAggregator(adapters, validator, history, {
    validateCoupons: config.VALIDATE_COUPONS,
    ...(deps.events ? { events: deps.events } : {}),
  });
}
