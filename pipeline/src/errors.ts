/**
 * Pipeline error kinds
 *
 * - DataUnavailableError: a source failed after retries; the fetcher falls
 *   back to neutral defaults and the run continues
 * - MalformedInputError: a matchup lacks identity fields; it is skipped
 * - ConfigurationError: bad env or config; fatal before any scoring
 * - HttpError: a non-2xx response, carrying the status for retry decisions
 */

export { ConfigurationError } from '@hrcast/model';

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message: string = `HTTP ${status} from ${url}`) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

export class DataUnavailableError extends Error {
  readonly source: string;
  readonly key: string;

  constructor(source: string, key: string, cause?: unknown) {
    super(`${source} unavailable for ${key}: ${describeError(cause)}`, { cause });
    this.name = 'DataUnavailableError';
    this.source = source;
    this.key = key;
  }
}

export class MalformedInputError extends Error {
  readonly matchupId: string;
  readonly missing: string[];

  constructor(matchupId: string, missing: string[]) {
    super(`Matchup ${matchupId || '(no id)'} is missing ${missing.join(', ')}`);
    this.name = 'MalformedInputError';
    this.matchupId = matchupId;
    this.missing = missing;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
