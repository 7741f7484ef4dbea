import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DataUnavailableError, HttpError } from '../errors.js';
import { cachedFetch } from './cached-fetch.js';
import { removeDir, tempDir, testContext, type TestContext } from '../../test/helpers/http.js';

const schema = z.object({ n: z.number() });

describe('cachedFetch', () => {
  let dir: string;
  let t: TestContext;

  beforeEach(() => {
    dir = tempDir();
    t = testContext(dir, async () => new Response('{}'), 3);
  });

  afterEach(() => {
    removeDir(dir);
  });

  const request = (load: () => Promise<{ n: number }>) => ({
    kind: 'schedule' as const,
    key: 'k',
    source: 'test-source',
    schema,
    load,
    fallback: { n: -1 },
  });

  it('should load on a miss and write through to the cache', async () => {
    const outcome = await cachedFetch(t.ctx, request(async () => ({ n: 7 })));

    expect(outcome).toEqual({ value: { n: 7 }, degraded: false, fromCache: false });
    expect(t.cache.get('schedule', 'k')).toMatchObject({ hit: true, value: { n: 7 } });
  });

  it('should serve a cached value without calling the source', async () => {
    t.cache.set('schedule', 'k', { n: 3 });
    let calls = 0;

    const outcome = await cachedFetch(
      t.ctx,
      request(async () => {
        calls++;
        return { n: 9 };
      })
    );

    expect(outcome).toEqual({ value: { n: 3 }, degraded: false, fromCache: true });
    expect(calls).toBe(0);
  });

  it('should refetch when the cached value no longer matches the schema', async () => {
    t.cache.set('schedule', 'k', { n: 'three' });

    const outcome = await cachedFetch(t.ctx, request(async () => ({ n: 4 })));

    expect(outcome.value).toEqual({ n: 4 });
    expect(outcome.fromCache).toBe(false);
  });

  it('should return the fallback marked degraded after retries run out', async () => {
    let calls = 0;
    const outcome = await cachedFetch(
      t.ctx,
      request(async () => {
        calls++;
        throw new HttpError(503, 'https://example.test/schedule');
      })
    );

    expect(calls).toBe(3);
    expect(t.sleeps).toEqual([10, 20]);
    expect(outcome.value).toEqual({ n: -1 });
    expect(outcome.degraded).toBe(true);
    expect(outcome.error).toBeInstanceOf(DataUnavailableError);
    expect(outcome.error?.source).toBe('test-source');
    expect(outcome.error?.key).toBe('k');
    expect(t.cache.get('schedule', 'k')).toEqual({ hit: false, reason: 'missing' });
  });
});
