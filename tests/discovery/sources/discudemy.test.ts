import { afterEach, describe, expect, it, vi } from 'vitest';
import { DiscudemySource } from '../../../src/discovery/sources/discudemy.js';
import { HttpRequestError } from '../../../src/shared/errors.js';
import { FakeHttpClient } from '../../helpers/fake-http-client.js';
import { loadFixture } from '../../helpers/fixtures.js';

const LISTING = loadFixture('discudemy-listing.html');
const DETAIL = loadFixture('discudemy-go.html');
const COURSE_URL = 'https://www.udemy.com/course/python-data-science/?couponCode=DATASCIENCE2024';

function fakeSite(): FakeHttpClient {
  return new FakeHttpClient()
    .text('https://www.discudemy.com/all/1', LISTING)
    .text('https://www.discudemy.com/all/2', LISTING)
    .text('https://www.discudemy.com/all/3', LISTING)
    .onPrefix('https://www.discudemy.com/go/', () => ({ text: DETAIL }));
}

describe('DiscudemySource', () => {
  it('follows every stub on three listing pages to its course link', async () => {
    const http = fakeSite();

    const result = await new DiscudemySource(http, { itemDelayMs: 0, pageDelayMs: 0 }).fetch();

    expect(result.candidates).toHaveLength(9);
    expect(result.candidates.every((c) => c.rawUrl === COURSE_URL)).toBe(true);
    expect(result.requests).toBe(12);
    expect(result.errors).toEqual([]);
  });

  it('takes titles from the stub, falling back to the slug', async () => {
    const http = fakeSite();

    const result = await new DiscudemySource(http, { itemDelayMs: 0, pageDelayMs: 0 }).fetch();

    expect(result.candidates.slice(0, 3).map((c) => c.title)).toEqual([
      'Python for Data Science',
      'Learn SQL Basics',
      'React From Scratch',
    ]);
  });

  it('requests the go page for each stub slug', async () => {
    const http = fakeSite();

    await new DiscudemySource(http, { itemDelayMs: 0, pageDelayMs: 0 }).fetch();

    expect(http.requestsTo('https://www.discudemy.com/go/').slice(0, 3).map((r) => r.target)).toEqual([
      'https://www.discudemy.com/go/python-for-data-science',
      'https://www.discudemy.com/go/learn-sql-basics',
      'https://www.discudemy.com/go/react-from-scratch',
    ]);
  });

  it('records a failed listing page and carries on with the next', async () => {
    const http = fakeSite().fail(
      'https://www.discudemy.com/all/2',
      new HttpRequestError('HTTP 500', 'HTTP_ERROR', 'https://www.discudemy.com/all/2', 500),
    );

    const result = await new DiscudemySource(http, { itemDelayMs: 0, pageDelayMs: 0 }).fetch();

    expect(result.candidates).toHaveLength(6);
    expect(result.errors).toEqual([
      { url: 'https://www.discudemy.com/all/2', message: 'HTTP 500', code: 'HTTP_ERROR' },
    ]);
  });

  it('skips a stub whose detail page has no course link', async () => {
    const http = fakeSite().text(
      'https://www.discudemy.com/go/learn-sql-basics',
      '<html><body><div class="ui segment">Expired</div></body></html>',
    );

    const result = await new DiscudemySource(http, { itemDelayMs: 0, pageDelayMs: 0 }).fetch();

    expect(result.candidates).toHaveLength(6);
    expect(result.errors).toEqual([]);
  });

  describe('pacing', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('spaces go pages 300ms apart and listing pages by the page delay', async () => {
      vi.useFakeTimers();
      const http = fakeSite();
      const start = Date.now();

      const fetching = new DiscudemySource(http).fetch();
      await vi.runAllTimersAsync();
      const result = await fetching;

      expect(result.candidates).toHaveLength(9);
      expect(http.timesOf('https://www.discudemy.com/all/', start)).toEqual([0, 1600, 3200]);
      expect(http.timesOf('https://www.discudemy.com/go/', start)).toEqual([
        0, 300, 600, 1600, 1900, 2200, 3200, 3500, 3800,
      ]);
    });

    it('does not request the next go page before the interval has passed', async () => {
      vi.useFakeTimers();
      const http = fakeSite();

      const fetching = new DiscudemySource(http, { itemDelayMs: 300, pageDelayMs: 1000 }).fetch();
      await vi.advanceTimersByTimeAsync(0);
      expect(http.requestsTo('https://www.discudemy.com/go/')).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(299);
      expect(http.requestsTo('https://www.discudemy.com/go/')).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(http.requestsTo('https://www.discudemy.com/go/')).toHaveLength(2);

      await vi.runAllTimersAsync();
      await fetching;
    });
  });
});
