import type { Pair, Timeframe } from './types.js';

export type FetchErrorKind = 'http' | 'api' | 'parse' | 'network' | 'timeout' | 'quota';

/** Data provider failed for one pair/timeframe. Recoverable; isolated to that key. */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly pair: Pair;
  readonly timeframe: Timeframe;

  constructor(kind: FetchErrorKind, pair: Pair, timeframe: Timeframe, message: string, options?: { cause?: unknown }) {
    super(`${pair} ${timeframe}: ${message}`, options);
    this.name = 'FetchError';
    this.kind = kind;
    this.pair = pair;
    this.timeframe = timeframe;
  }
}

export class NotifyError extends Error {
  readonly channels: string[];

  constructor(channels: string[], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifyError';
    this.channels = channels;
  }
}

/** Invalid startup configuration. The only fatal error kind. */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** node-fetch rejects with AbortError when the request signal fires. */
export function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
