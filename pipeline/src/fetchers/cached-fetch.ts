/**
 * The one contract every fetcher follows:
 * cache → source with retries → write-through, or a neutral fallback.
 */

import type { z } from 'zod';
import type { CacheKind, FileCache } from '../cache/file-cache.js';
import { DataUnavailableError } from '../errors.js';
import { withRetry } from '../http/retry.js';

export interface FetchContext {
  cache: FileCache;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
  };
}

export interface FetchOutcome<T> {
  value: T;
  /** True when the fallback was returned */
  degraded: boolean;
  fromCache: boolean;
  error?: DataUnavailableError;
}

export interface CachedFetchRequest<T> {
  kind: CacheKind;
  key: string;
  /** Human-readable source name, e.g. "mlb-stats" */
  source: string;
  /** Re-validates cached values so a format change never leaks stale shapes */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  load: () => Promise<T>;
  fallback: T;
}

export async function cachedFetch<T>(ctx: FetchContext, request: CachedFetchRequest<T>): Promise<FetchOutcome<T>> {
  const { kind, key, source, schema } = request;

  const lookup = ctx.cache.get(kind, key);
  if (lookup.hit) {
    const cached = schema.safeParse(lookup.value);
    if (cached.success) {
      return { value: cached.data, degraded: false, fromCache: true };
    }
    console.warn(`  ⚠️ [Cache] Discarding unreadable ${kind} entry for ${key}`);
  } else if (lookup.reason === 'corrupt') {
    console.warn(`  ⚠️ [Cache] Corrupt ${kind} entry for ${key}, refetching`);
  }

  try {
    const value = await withRetry(request.load, {
      maxAttempts: ctx.retry.maxAttempts,
      baseDelayMs: ctx.retry.baseDelayMs,
      sleep: ctx.retry.sleep,
      label: `${source} ${key}`,
    });
    ctx.cache.set(kind, key, value);
    return { value, degraded: false, fromCache: false };
  } catch (cause) {
    const error = new DataUnavailableError(source, key, cause);
    console.warn(`  ❌ [${source}] ${error.message}; using defaults`);
    return { value: request.fallback, degraded: true, fromCache: false, error };
  }
}
