/**
 * Thin HTTP helpers over the global fetch with per-call timeouts
 */

import type { z } from 'zod';
import { HttpError } from '../errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetch?: FetchLike;
  timeoutMs: number;
}

/**
 * Raised when a 2xx response does not match the expected shape.
 * Not transient: asking again returns the same payload.
 */
export class ResponseShapeError extends Error {
  constructor(url: string, issues: z.ZodIssue[]) {
    const detail = issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = 'ResponseShapeError';
  }
}

async function request(url: string, options: HttpOptions, init: RequestInit = {}): Promise<Response> {
  const doFetch = options.fetch ?? fetch;
  const response = await doFetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
  if (!response.ok) {
    throw new HttpError(response.status, url);
  }
  return response;
}

export async function fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: HttpOptions): Promise<T> {
  const response = await request(url, options);
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ResponseShapeError(url, parsed.error.issues);
  }
  return parsed.data;
}

export async function fetchText(url: string, options: HttpOptions): Promise<string> {
  const response = await request(url, options);
  return response.text();
}

export async function postJson(url: string, body: unknown, options: HttpOptions): Promise<unknown> {
  const response = await request(url, options, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
  return response.json();
}
