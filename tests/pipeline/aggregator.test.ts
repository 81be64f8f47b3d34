import { describe, expect, it, vi } from 'vitest';
import type { NormalizedCourseUrl, SourceAdapter } from '../../src/discovery/types.js';
import { SOURCE_KINDS } from '../../src/discovery/sources/index.js';
import { CourseAggregator } from '../../src/pipeline/aggregator.js';
import { HistoryCache } from '../../src/pipeline/history-cache.js';
import { TypedEventEmitter } from '../../src/shared/events.js';
import { PipelineRunError } from '../../src/shared/errors.js';
import { rejectingAdapter, stubAdapter } from '../helpers/stub-adapter.js';

const A = 'https://www.udemy.com/course/alpha/?couponCode=A1';
const B = 'https://udemy.com/course/beta/?coupon=B1&ref=x';
const C = 'https://www.udemy.com/course/gamma/?coupon_code=C1';

const A_HREF = 'https://www.udemy.com/course/alpha?couponCode=A1';
const B_HREF = 'https://www.udemy.com/course/beta?coupon=B1';
const C_HREF = 'https://www.udemy.com/course/gamma?coupon_code=C1';

function alwaysFree() {
  return { validate: vi.fn(async (_url: NormalizedCourseUrl) => true) };
}

describe('CourseAggregator', () => {
  it('deduplicates by canonical URL, keeping the first occurrence', async () => {
    const aggregator = new CourseAggregator(
      [
        stubAdapter('real-discount', [
          { title: 'Alpha (API)', rawUrl: A },
          { title: 'Beta', rawUrl: B },
        ]),
        stubAdapter('discudemy', [{ title: 'Alpha (mirror)', rawUrl: `${A}&utm_source=x` }]),
      ],
      alwaysFree(),
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF, B_HREF]);
    expect(result.courses[0]).toEqual({ title: 'Alpha (API)', url: A_HREF, source: 'real-discount' });
    expect(result.stats.duplicates).toBe(1);
  });

  it('merges sources in adapter order', async () => {
    const aggregator = new CourseAggregator(
      [
        stubAdapter('real-discount', [{ rawUrl: C }]),
        stubAdapter('discudemy', [{ rawUrl: A }]),
        stubAdapter('udemy-freebies', [{ rawUrl: B }, { rawUrl: C }]),
      ],
      alwaysFree(),
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([C_HREF, A_HREF, B_HREF]);
    expect(result.courses.map((c) => c.source)).toEqual(['real-discount', 'discudemy', 'udemy-freebies']);
  });

  it('never emits the same URL twice across runs', async () => {
    const history = new HistoryCache();
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }, { rawUrl: B }])],
      alwaysFree(),
      history,
      { events: new TypedEventEmitter() },
    );

    const first = await aggregator.run();
    const second = await aggregator.run();

    expect(first.urls).toEqual([A_HREF, B_HREF]);
    expect(second.urls).toEqual([]);
    expect(second.stats.alreadySeen).toBe(2);
    expect(history.values()).toEqual([A_HREF, B_HREF]);
  });

  it('emits again after the history is cleared', async () => {
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }])],
      alwaysFree(),
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    await aggregator.run();
    expect(aggregator.clearHistory()).toBe(1);
    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF]);
  });

  it('drops rejected URLs and coupons that are not free', async () => {
    const validator = {
      validate: vi.fn(async (url: NormalizedCourseUrl) => url.slug !== 'beta'),
    };
    const aggregator = new CourseAggregator(
      [
        stubAdapter('real-discount', [
          { rawUrl: A },
          { rawUrl: 'https://www.udemy.com/course/no-coupon/' },
          { rawUrl: 'https://example.com/course/x/?couponCode=X' },
          { rawUrl: B },
        ]),
      ],
      validator,
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF]);
    expect(result.stats).toEqual({
      candidates: 4,
      rejected: 2,
      duplicates: 0,
      notFree: 1,
      alreadySeen: 0,
      confirmed: 1,
      perSource: { 'real-discount': 4 },
    });
    expect(validator.validate).toHaveBeenCalledTimes(2);
  });

  it('treats a throwing validator as not free for that URL only', async () => {
    const validator = {
      validate: vi.fn(async (url: NormalizedCourseUrl) => {
        if (url.slug === 'alpha') throw new Error('pricing exploded');
        return true;
      }),
    };
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }, { rawUrl: B }])],
      validator,
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([B_HREF]);
    expect(result.stats.notFree).toBe(1);
  });

  it('skips validation when disabled', async () => {
    const validator = alwaysFree();
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }])],
      validator,
      new HistoryCache(),
      { validateCoupons: false, events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF]);
    expect(validator.validate).not.toHaveBeenCalled();
  });

  it('turns source errors and rejected adapters into notes', async () => {
    const events = new TypedEventEmitter();
    const failed = vi.fn();
    events.on('source:failed', failed);

    const aggregator = new CourseAggregator(
      [
        stubAdapter('real-discount', [{ rawUrl: A }], [
          { url: 'https://cdn.real.discount/api/courses?page=2', message: 'HTTP 503', code: 'HTTP_ERROR' },
        ]),
        rejectingAdapter('discudemy', new Error('socket hang up')),
        stubAdapter('udemy-freebies', [{ rawUrl: B }]),
      ],
      alwaysFree(),
      new HistoryCache(),
      { events },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF, B_HREF]);
    expect(result.notes).toEqual([
      {
        source: 'real-discount',
        url: 'https://cdn.real.discount/api/courses?page=2',
        message: 'HTTP 503',
        code: 'HTTP_ERROR',
      },
      { source: 'discudemy', message: 'socket hang up', code: 'ADAPTER_REJECTED' },
    ]);
    expect(failed).toHaveBeenCalledWith(
      expect.objectContaining({ source: 'discudemy', error: 'socket hang up' }),
    );
  });

  it('returns an empty result when every source is empty', async () => {
    const validator = alwaysFree();
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', []), stubAdapter('discudemy', [])],
      validator,
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.courses).toEqual([]);
    expect(result.urls).toEqual([]);
    expect(result.notes).toEqual([]);
    expect(result.stats.candidates).toBe(0);
    expect(validator.validate).not.toHaveBeenCalled();
  });

  it('leaves the history untouched when a run fails', async () => {
    class BrokenHistory extends HistoryCache {
      override has(_url: string): boolean {
        throw new Error('history unavailable');
      }
    }
    const history = new BrokenHistory(10);
    history.add('https://www.udemy.com/course/old?couponCode=OLD');
    const events = new TypedEventEmitter();
    const runFailed = vi.fn();
    events.on('run:failed', runFailed);

    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }, { rawUrl: B }])],
      alwaysFree(),
      history,
      { events },
    );

    const failure = await aggregator.run().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PipelineRunError);
    expect(history.values()).toEqual(['https://www.udemy.com/course/old?couponCode=OLD']);
    expect(runFailed).toHaveBeenCalledTimes(1);
  });

  it('keeps a committed run when an event listener throws', async () => {
    const events = new TypedEventEmitter();
    const announced: string[] = [];
    const runFailed = vi.fn();
    events.on('course:confirmed', ({ url }) => {
      announced.push(url);
      throw new Error('listener failed');
    });
    events.on('run:completed', () => {
      throw new Error('listener failed');
    });
    events.on('run:failed', runFailed);
    const history = new HistoryCache();

    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }, { rawUrl: B }])],
      alwaysFree(),
      history,
      { events },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF, B_HREF]);
    expect(announced).toEqual([A_HREF, B_HREF]);
    expect(history.values()).toEqual([A_HREF, B_HREF]);
    expect(runFailed).not.toHaveBeenCalled();
  });

  it('fails the run without touching history when a source:started listener throws', async () => {
    const events = new TypedEventEmitter();
    const runFailed = vi.fn();
    events.on('source:started', () => {
      throw new Error('listener failed');
    });
    events.on('run:failed', runFailed);
    const history = new HistoryCache();

    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }])],
      alwaysFree(),
      history,
      { events },
    );

    const failure = await aggregator.run().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PipelineRunError);
    expect(history.size).toBe(0);
    expect(runFailed).toHaveBeenCalledTimes(1);
  });

  it('turns an adapter that throws synchronously into a note', async () => {
    const throwing: SourceAdapter = {
      id: 'discudemy',
      kind: SOURCE_KINDS.discudemy,
      fetch: () => {
        throw new Error('not ready');
      },
    };
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }]), throwing],
      alwaysFree(),
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.urls).toEqual([A_HREF]);
    expect(result.notes).toEqual([{ source: 'discudemy', message: 'not ready', code: 'ADAPTER_REJECTED' }]);
  });

  it('announces each confirmed course in order', async () => {
    const events = new TypedEventEmitter();
    const confirmed: string[] = [];
    events.on('course:confirmed', ({ url }) => confirmed.push(url));

    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: B }, { rawUrl: A }])],
      alwaysFree(),
      new HistoryCache(),
      { events },
    );

    const result = await aggregator.run('manual');

    expect(confirmed).toEqual([B_HREF, A_HREF]);
    expect(result.trigger).toBe('manual');
  });

  it('uses a placeholder title when no source supplied one', async () => {
    const aggregator = new CourseAggregator(
      [stubAdapter('real-discount', [{ rawUrl: A }])],
      alwaysFree(),
      new HistoryCache(),
      { events: new TypedEventEmitter() },
    );

    const result = await aggregator.run();

    expect(result.courses[0]?.title).toBe('Udemy Course');
  });
});
