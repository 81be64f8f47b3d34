import { describe, expect, it } from 'vitest';
import { createPipeline } from '../../src/pipeline/index.js';
import { TypedEventEmitter } from '../../src/shared/events.js';
import { HttpRequestError } from '../../src/shared/errors.js';
import { FakeHttpClient, type RecordedRequest } from '../helpers/fake-http-client.js';
import { loadFixture, loadJsonFixture } from '../helpers/fixtures.js';

const PRICING_PREFIX = 'https://www.udemy.com/api-2.0/courses/';
const FREEBIES_URL = 'https://www.udemyfreebies.com/free-udemy-courses';

const EXPECTED_URLS = [
  'https://www.udemy.com/course/python-complete?couponCode=FREEPYTHON123',
  'https://www.udemy.com/course/machine-learning?couponCode=FREEML2024',
  'https://www.udemy.com/course/web-dev-bootcamp?coupon_code=WEBDEV100',
  'https://www.udemy.com/course/python-data-science?couponCode=DATASCIENCE2024',
  'https://www.udemy.com/course/angular-complete?couponCode=ANGULAR100',
  'https://www.udemy.com/course/javascript-bootcamp?couponCode=JSBOOT2024',
  'https://www.udemy.com/course/aws-certified?coupon=AWSFREE',
  'https://www.udemy.com/course/data-structures?couponCode=ALGO2024',
];

function allFree(_request: RecordedRequest) {
  return { json: { price: 'Free', discount: { discount_percent: 100, price: { amount: 0 } } } };
}

function fakeInternet(pricing: (request: RecordedRequest) => { json: unknown } = allFree): FakeHttpClient {
  const discudemyListing = loadFixture('discudemy-listing.html');
  const discudemyDetail = loadFixture('discudemy-go.html');
  const courseVaniaDetail = loadFixture('coursevania-detail.html');

  return new FakeHttpClient()
    .json(
      'https://cdn.real.discount/api/courses?page=1&limit=100&sortBy=sale_start&store=Udemy&freeOnly=true',
      loadJsonFixture('real-discount-page.json'),
    )
    .text('https://www.discudemy.com/all/1', discudemyListing)
    .text('https://www.discudemy.com/all/2', discudemyListing)
    .text('https://www.discudemy.com/all/3', discudemyListing)
    .onPrefix('https://www.discudemy.com/go/', () => ({ text: discudemyDetail }))
    .text('https://coursevania.com/courses/', loadFixture('coursevania-courses.html'))
    .json('https://coursevania.com/wp-admin/admin-ajax.php', loadJsonFixture('coursevania-grid.json'))
    .onPrefix('https://coursevania.com/courses/', () => ({ text: courseVaniaDetail }))
    .text(FREEBIES_URL, loadFixture('udemy-freebies.html'))
    .onPrefix(PRICING_PREFIX, pricing);
}

function pipelineFor(http: FakeHttpClient) {
  return createPipeline(
    {
      API_PAGE_COUNT: 1,
      HISTORY_CAPACITY: 2000,
      VALIDATION_TIMEOUT_MS: 15_000,
      VALIDATE_COUPONS: true,
    },
    { http, events: new TypedEventEmitter(), sources: { itemDelayMs: 0, pageDelayMs: 0 } },
  );
}

describe('pipeline end to end', () => {
  it('confirms every unique free course once across all four sources', async () => {
    const http = fakeInternet();
    const pipeline = pipelineFor(http);

    const result = await pipeline.run();

    expect(result.urls).toEqual(EXPECTED_URLS);
    expect(result.stats).toEqual({
      candidates: 17,
      rejected: 0,
      duplicates: 9,
      notFree: 0,
      alreadySeen: 0,
      confirmed: 8,
      perSource: { 'real-discount': 3, discudemy: 9, coursevania: 2, 'udemy-freebies': 3 },
    });
    expect(result.notes).toEqual([]);
    expect(http.requestsTo(PRICING_PREFIX)).toHaveLength(8);
  });

  it('keeps the first-seen title for each course', async () => {
    const result = await pipelineFor(fakeInternet()).run();

    expect(result.courses.map((course) => course.title)).toEqual([
      'Complete Python Bootcamp',
      'Machine Learning A-Z',
      'Web Development Bootcamp',
      'Python for Data Science',
      'Angular Complete Course',
      'JavaScript Bootcamp',
      'AWS Certified Cloud Practitioner',
      'Udemy Course',
    ]);
  });

  it('confirms nothing on an immediate second run', async () => {
    const http = fakeInternet();
    const pipeline = pipelineFor(http);

    await pipeline.run();
    const second = await pipeline.run();

    expect(second.urls).toEqual([]);
    expect(second.stats.alreadySeen).toBe(8);
    expect(pipeline.historySize).toBe(8);
    // Definitive verdicts are reused
    expect(http.requestsTo(PRICING_PREFIX)).toHaveLength(8);
  });

  it('leaves out a course whose coupon is no longer free', async () => {
    const http = fakeInternet((request) =>
      request.target.includes('/aws-certified/')
        ? { json: { price: '$84.99', discount: { discount_percent: 85, price: { amount: 12.99 } } } }
        : allFree(request),
    );

    const result = await pipelineFor(http).run();

    expect(result.urls).toEqual(EXPECTED_URLS.filter((url) => !url.includes('aws-certified')));
    expect(result.stats.notFree).toBe(1);
  });

  it('reports a failing source and still confirms the rest', async () => {
    const http = fakeInternet().fail(
      FREEBIES_URL,
      new HttpRequestError(`HTTP 503 from ${FREEBIES_URL}`, 'HTTP_ERROR', FREEBIES_URL, 503),
    );

    const result = await pipelineFor(http).run();

    expect(result.urls).toEqual(EXPECTED_URLS.slice(0, 5));
    expect(result.notes).toEqual([
      {
        source: 'udemy-freebies',
        url: FREEBIES_URL,
        message: `HTTP 503 from ${FREEBIES_URL}`,
        code: 'HTTP_ERROR',
      },
    ]);
  });
});
