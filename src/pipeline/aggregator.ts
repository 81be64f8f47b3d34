/**
 * Course aggregator: one pipeline run from raw listings to confirmed URLs.
 *
 *   fetch (all sources, concurrently)
 *     -> merge in source priority order
 *     -> normalize, drop rejects
 *     -> dedup within the run (first seen wins)
 *     -> validate coupons
 *     -> drop URLs emitted by earlier runs
 *     -> commit to history, return
 *
 * History is only written in the final step, so a run that fails part way
 * leaves it exactly as it was. Events announcing a committed run are sent
 * after the commit and cannot turn it into a failure.
 */

import { ulid } from 'ulid';
import { getRunLogger, type Logger } from '../shared/logger.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { PipelineRunError, errorMessage } from '../shared/errors.js';
import { normalizeCourseUrl } from '../discovery/url-normalizer.js';
import type {
  CourseCandidate,
  NormalizedCourseUrl,
  SourceAdapter,
  SourceFetchResult,
} from '../discovery/types.js';
import type { CouponValidator } from '../validation/coupon-validator.js';
import { HistoryCache } from './history-cache.js';
import type {
  ConfirmedCourse,
  PipelineRunResult,
  PipelineRunner,
  RunCounts,
  RunTrigger,
  SourceFailureNote,
} from './types.js';

const UNTITLED = 'Udemy Course';

export interface AggregatorOptions {
  /** When false, every normalized URL is treated as free. Default: true */
  validateCoupons?: boolean;
  events?: TypedEventEmitter;
}

interface UniqueCandidate {
  candidate: CourseCandidate;
  url: NormalizedCourseUrl;
}

export class CourseAggregator implements PipelineRunner {
  private readonly validateCoupons: boolean;
  private readonly events: TypedEventEmitter;

  constructor(
    private readonly adapters: readonly SourceAdapter[],
    private readonly validator: Pick<CouponValidator, 'validate'>,
    private readonly history: HistoryCache = new HistoryCache(),
    options: AggregatorOptions = {},
  ) {
    this.validateCoupons = options.validateCoupons ?? true;
    this.events = options.events ?? eventBus;
  }

  get historySize(): number {
    return this.history.size;
  }

  clearHistory(): number {
    return this.history.clear();
  }

  async run(trigger: RunTrigger = 'direct'): Promise<PipelineRunResult> {
    const runId = ulid();
    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();
    const log = getRunLogger('pipeline', runId);

    log.info({ trigger, sources: this.adapters.map((a) => a.id) }, 'Pipeline run started');

    let result: PipelineRunResult;
    try {
      this.events.emit('run:started', { runId, trigger });
      const fetched = await this.fetchAll(runId, log);
      const notes = this.collectNotes(fetched);
      const counts = this.emptyCounts();

      const candidates: CourseCandidate[] = [];
      for (const fetchResult of fetched) {
        counts.perSource[fetchResult.source] = fetchResult.candidates.length;
        candidates.push(...fetchResult.candidates);
      }
      counts.candidates = candidates.length;

      const unique = this.dedupe(candidates, counts);
      const free = await this.filterFree(unique, counts, log);

      const confirmed: ConfirmedCourse[] = [];
      for (const { candidate, url } of free) {
        if (this.history.has(url.href)) {
          counts.alreadySeen++;
          continue;
        }
        confirmed.push({
          title: candidate.title ?? UNTITLED,
          url: url.href,
          source: candidate.source,
        });
      }
      counts.confirmed = confirmed.length;

      // Commit point: nothing after this may fail the run
      const evicted = this.history.addAll(confirmed.map((course) => course.url));

      const durationMs = Date.now() - startTime;
      log.info(
        { ...counts, notes: notes.length, evicted: evicted.length, historySize: this.history.size, durationMs },
        'Pipeline run completed',
      );

      result = {
        runId,
        trigger,
        startedAt,
        courses: confirmed,
        urls: confirmed.map((course) => course.url),
        notes,
        stats: counts,
        durationMs,
      };
    } catch (error) {
      const failure = new PipelineRunError(`Pipeline run ${runId} failed: ${errorMessage(error)}`, runId, error);
      log.error({ err: error }, 'Pipeline run failed');
      this.notifySafely(log, () => this.events.emit('run:failed', { runId, error: failure.message }));
      throw failure;
    }

    const { courses, stats, durationMs } = result;
    for (const course of courses) {
      this.notifySafely(log, () => this.events.emit('course:confirmed', { runId, ...course }));
    }
    this.notifySafely(log, () =>
      this.events.emit('run:completed', {
        runId,
        candidates: stats.candidates,
        confirmed: stats.confirmed,
        durationMs,
      }),
    );

    return result;
  }

  // ---------------------------------------------------------------------------
  // Internal steps
  // ---------------------------------------------------------------------------

  /**
   * Runs every adapter concurrently. Results come back in adapter order,
   * which is the merge priority. An adapter that rejects in spite of its
   * contract becomes an empty result carrying the error.
   */
  private async fetchAll(runId: string, log: Logger): Promise<SourceFetchResult[]> {
    const settled = await Promise.allSettled(
      this.adapters.map((adapter) => {
        this.events.emit('source:started', { runId, source: adapter.id });
        // A synchronous throw becomes a rejection like any other
        return Promise.resolve().then(() => adapter.fetch());
      }),
    );

    return settled.map((outcome, index): SourceFetchResult => {
      const adapter = this.adapters[index];
      if (!adapter) {
        throw new PipelineRunError(`No adapter for fetch result ${index}`, runId);
      }

      if (outcome.status === 'fulfilled') {
        this.events.emit('source:completed', {
          runId,
          source: adapter.id,
          candidates: outcome.value.candidates.length,
          errors: outcome.value.errors.length,
        });
        return outcome.value;
      }

      const message = errorMessage(outcome.reason);
      log.warn({ source: adapter.id, err: outcome.reason }, 'Source adapter rejected');
      this.events.emit('source:failed', { runId, source: adapter.id, error: message });
      return {
        source: adapter.id,
        candidates: [],
        errors: [{ message, code: 'ADAPTER_REJECTED' }],
        requests: 0,
        durationMs: 0,
      };
    });
  }

  /** Listener errors are logged; they never change the outcome of a run. */
  private notifySafely(log: Logger, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      log.warn({ err: error }, 'Event listener threw');
    }
  }

  private collectNotes(results: readonly SourceFetchResult[]): SourceFailureNote[] {
    return results.flatMap((result) =>
      result.errors.map((failure) => ({ source: result.source, ...failure })),
    );
  }

  /** Normalizes and keeps the first candidate for each canonical URL. */
  private dedupe(candidates: readonly CourseCandidate[], counts: RunCounts): UniqueCandidate[] {
    const seen = new Map<string, UniqueCandidate>();

    for (const candidate of candidates) {
      const url = normalizeCourseUrl(candidate.rawUrl);
      if (!url) {
        counts.rejected++;
        continue;
      }
      if (seen.has(url.href)) {
        counts.duplicates++;
        continue;
      }
      seen.set(url.href, { candidate, url });
    }

    return [...seen.values()];
  }

  /**
   * Validates sequentially to keep the pricing API's request rate low.
   * A validator that throws counts as "not free" for that URL only.
   */
  private async filterFree(
    unique: readonly UniqueCandidate[],
    counts: RunCounts,
    log: Logger,
  ): Promise<UniqueCandidate[]> {
    if (!this.validateCoupons) {
      return [...unique];
    }

    const free: UniqueCandidate[] = [];
    for (const entry of unique) {
      let isFree = false;
      try {
        isFree = await this.validator.validate(entry.url);
      } catch (error) {
        log.warn({ url: entry.url.href, err: error }, 'Validator threw, treating coupon as not free');
      }

      if (isFree) {
        free.push(entry);
      } else {
        counts.notFree++;
      }
    }
    return free;
  }

  private emptyCounts(): RunCounts {
    return {
      candidates: 0,
      rejected: 0,
      duplicates: 0,
      notFree: 0,
      alreadySeen: 0,
      confirmed: 0,
      perSource: {},
    };
  }
}
