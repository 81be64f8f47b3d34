import { describe, expect, it } from 'vitest';
import { SOURCE_ORDER, createSourceAdapters } from '../../../src/discovery/sources/index.js';
import { FakeHttpClient } from '../../helpers/fake-http-client.js';

describe('createSourceAdapters', () => {
  it('creates one adapter per source in merge order', () => {
    const adapters = createSourceAdapters(new FakeHttpClient());

    expect(adapters.map((a) => a.id)).toEqual([
      'real-discount',
      'discudemy',
      'coursevania',
      'udemy-freebies',
    ]);
    expect(adapters.map((a) => a.kind)).toEqual(['json-api', 'list-detail', 'ajax-token', 'single-page']);
  });

  it('keeps merge order when only some sources are enabled', () => {
    const adapters = createSourceAdapters(new FakeHttpClient(), {
      enabled: ['udemy-freebies', 'real-discount'],
    });

    expect(adapters.map((a) => a.id)).toEqual(['real-discount', 'udemy-freebies']);
  });

  it('lists every source exactly once', () => {
    expect(new Set(SOURCE_ORDER).size).toBe(4);
  });
});
