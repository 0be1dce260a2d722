/**
 * Retry Policy
 * Pure retry/backoff decisions for a single request's attempt loop
 */

import { CrawlError, CrawlErrorKind } from './crawler.errors';

export interface RetryOptions {
  /** Total attempts permitted, first try included */
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  /** SSL failures only retry when verification is disabled */
  sslVerify: boolean;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'stop'; reason: 'not_retryable' | 'budget_exhausted' };

/**
 * Whether a failure of this kind may be attempted again
 */
export function isRetryable(
  kind: CrawlErrorKind,
  statusCode: number | undefined,
  options: Pick<RetryOptions, 'sslVerify'>
): boolean {
  switch (kind) {
    case CrawlErrorKind.CONNECTION_FAILURE:
    case CrawlErrorKind.DNS_FAILURE:
    case CrawlErrorKind.TIMEOUT:
    case CrawlErrorKind.PROXY_FAILURE:
      return true;
    case CrawlErrorKind.HTTP_STATUS:
      return statusCode !== undefined && statusCode >= 500 && statusCode <= 599;
    case CrawlErrorKind.SSL_VERIFICATION_FAILURE:
      return !options.sslVerify;
    default:
      return false;
  }
}

export function backoffDelay(attemptIndex: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * Math.pow(options.backoffFactor, attemptIndex);
  return Math.min(options.maxDelayMs, delay);
}

/**
 * Decide what happens after the attempt at `attemptIndex` (zero-based) failed.
 */
export function decideRetry(
  attemptIndex: number,
  failure: Pick<CrawlError, 'kind' | 'statusCode'>,
  options: RetryOptions
): RetryDecision {
  if (!isRetryable(failure.kind, failure.statusCode, options)) {
    return { action: 'stop', reason: 'not_retryable' };
  }

  if (attemptIndex + 1 >= options.maxAttempts) {
    return { action: 'stop', reason: 'budget_exhausted' };
  }

  return { action: 'retry', delayMs: backoffDelay(attemptIndex, options) };
}

/**
 * Delays a permanently retryable failure goes through before giving up
 */
export function retryDelaySchedule(options: RetryOptions): number[] {
  const delays: number[] = [];
  const probe = { kind: CrawlErrorKind.TIMEOUT };

  for (let attempt = 0; ; attempt++) {
    const decision = decideRetry(attempt, probe, options);
    if (decision.action === 'stop') {
      return delays;
    }
    delays.push(decision.delayMs);
  }
}

/**
 * Abortable delay. Resolves early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
