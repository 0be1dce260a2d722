/**
 * Async Crawler
 * Runs crawl requests under a concurrency gate through proxy selection,
 * the HTTP executor, the retry loop and the extraction pipeline
 */

import { ExtractionPipeline } from '../extraction/extraction.pipeline';
import type { ExtractionResult } from '../extraction/extraction.types';
import { createLogger, Logger } from '../logging/logger';
import { HttpProxyProber } from '../proxy/proxy.health';
import { parseProxyAddress } from '../proxy/proxy.loader';
import { ProxyPool } from '../proxy/proxy.pool';
import type { ProxyProber, ProxyRecord } from '../proxy/proxy.types';
import { AxiosTransport } from './axios.transport';
import { ConcurrencyGate, Release } from './concurrency.gate';
import { extractionOptionsFrom, resolveCrawlerConfig, retryOptionsFrom } from './crawler.config';
import { classifyError, CrawlError, CrawlErrorKind, CrawlerStateError, errorMessage } from './crawler.errors';
import type {
  CrawlerConfig,
  CrawlerStats,
  CrawlRequest,
  CrawlResponse,
  FetchManyOptions,
  ResolvedCrawlerConfig,
} from './crawler.types';
import { HttpExchangeResult, HttpExecutor, HttpTransport } from './http.executor';
import { decideRetry, RetryOptions, sleep } from './retry.policy';

export interface AsyncCrawlerDeps {
  transport?: HttpTransport;
  proxyPool?: ProxyPool;
  prober?: ProxyProber;
  pipeline?: ExtractionPipeline;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

type CrawlerState = 'idle' | 'ready' | 'closing' | 'closed';

interface AttemptOutcome {
  attempts: number;
  proxy: ProxyRecord | null;
  exchange: HttpExchangeResult | null;
  extracted: ExtractionResult | null;
  failure: CrawlError | null;
}

export class AsyncCrawler {
  readonly config: ResolvedCrawlerConfig;
  readonly proxyPool: ProxyPool;
  private readonly gate: ConcurrencyGate;
  private readonly pipeline: ExtractionPipeline;
  private readonly retryOptions: RetryOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly injectedTransport?: HttpTransport;

  private state: CrawlerState = 'idle';
  private transport: HttpTransport | null = null;
  private executor: HttpExecutor | null = null;
  private closing: Promise<void> | null = null;
  private readonly inFlight: Set<Promise<CrawlResponse>> = new Set();
  private completedCount = 0;
  private failedCount = 0;

  constructor(config: CrawlerConfig = {}, deps: AsyncCrawlerDeps = {}) {
    this.config = resolveCrawlerConfig(config);
    this.logger = deps.logger ?? createLogger('AsyncCrawler', this.config.logLevel);
    this.gate = new ConcurrencyGate(this.config.maxConcurrentRequests);
    this.retryOptions = retryOptionsFrom(this.config);
    this.sleep = deps.sleep ?? sleep;
    this.injectedTransport = deps.transport;
    this.pipeline = deps.pipeline ?? new ExtractionPipeline(extractionOptionsFrom(this.config), this.logger);
    this.proxyPool =
      deps.proxyPool ??
      new ProxyPool(
        this.config.proxies,
        {
          failureThreshold: this.config.proxyFailureThreshold,
          revalidateAfterMs: this.config.proxyRevalidateAfterMs,
          prober:
            deps.prober ??
            new HttpProxyProber({
              testUrl: this.config.proxyTestUrl,
              timeoutMs: this.config.proxyProbeTimeoutMs,
              sslVerify: this.config.sslVerify,
              userAgent: this.config.userAgent,
            }),
        },
        this.logger
      );
  }

  /**
   * Open the connection pool and validate proxies. Call once per instance.
   */
  async setup(): Promise<void> {
    if (this.state !== 'idle') {
      throw new CrawlerStateError(`setup() called on a crawler that is ${this.state}`);
    }

    const transport = this.injectedTransport ?? new AxiosTransport({ sslVerify: this.config.sslVerify });

    try {
      if (!this.proxyPool.isPassThrough && this.config.validateProxiesOnSetup) {
        await this.proxyPool.validateAll();
      }
    } catch (error: unknown) {
      await transport.close();
      throw error;
    }

    this.transport = transport;
    this.executor = new HttpExecutor(transport, this.proxyPool, this.config);
    this.state = 'ready';
    this.logger.info(
      `Crawler ready (concurrency ${this.config.maxConcurrentRequests}, ${this.proxyPool.size()} proxies)`
    );
  }

  /**
   * Fetch and extract one page. Per-request failures come back in `error`; this never rejects for them.
   */
  fetch(request: CrawlRequest, signal?: AbortSignal): Promise<CrawlResponse> {
    const executor = this.requireReady();
    const task = this.process(freezeRequest(request), executor, signal);

    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
    return task;
  }

  /**
   * Results are in input order, whatever order the requests finish in.
   */
  fetchMany(requests: readonly CrawlRequest[], options: FetchManyOptions = {}): Promise<CrawlResponse[]> {
    this.requireReady();
    return Promise.all(requests.map((request) => this.fetch(request, options.signal)));
  }

  /**
   * Yield responses as they complete
   */
  async *stream(requests: readonly CrawlRequest[], options: FetchManyOptions = {}): AsyncGenerator<CrawlResponse> {
    this.requireReady();

    const pending = new Map<number, Promise<{ index: number; response: CrawlResponse }>>();
    requests.forEach((request, index) => {
      pending.set(
        index,
        this.fetch(request, options.signal).then((response) => ({ index, response }))
      );
    });

    while (pending.size > 0) {
      const { index, response } = await Promise.race(pending.values());
      pending.delete(index);
      yield response;
    }
  }

  /**
   * Wait for in-flight requests, then release connections. Later calls are no-ops.
   */
  cleanup(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    this.closing = this.close();
    return this.closing;
  }

  stats(): CrawlerStats {
    return {
      inFlight: this.gate.inFlight,
      pending: this.gate.pending,
      completed: this.completedCount,
      failed: this.failedCount,
    };
  }

  get isReady(): boolean {
    return this.state === 'ready';
  }

  private async close(): Promise<void> {
    const wasReady = this.state === 'ready';
    this.state = 'closing';

    if (wasReady) {
      await Promise.all(Array.from(this.inFlight));
      if (this.transport) {
        await this.transport.close();
      }
      this.logger.info(
        `Crawler closed (${this.completedCount} completed, ${this.failedCount} failed)`
      );
    }

    this.transport = null;
    this.executor = null;
    this.state = 'closed';
  }

  private requireReady(): HttpExecutor {
    if (this.state !== 'ready' || !this.executor) {
      throw new CrawlerStateError(
        this.state === 'idle' ? 'Crawler is not set up; call setup() first' : `Crawler is ${this.state}`
      );
    }
    return this.executor;
  }

  private async process(
    request: Readonly<CrawlRequest>,
    executor: HttpExecutor,
    signal?: AbortSignal
  ): Promise<CrawlResponse> {
    const startedAt = Date.now();

    let release: Release;
    try {
      release = await this.gate.acquire(signal);
    } catch (error: unknown) {
      return this.respond(request, startedAt, emptyOutcome(classifyError(error)));
    }

    try {
      return this.respond(request, startedAt, await this.attemptLoop(request, executor, signal));
    } catch (error: unknown) {
      return this.respond(request, startedAt, emptyOutcome(classifyError(error)));
    } finally {
      release();
    }
  }

  /**
   * Attempts run strictly one after another while the gate unit is held
   */
  private async attemptLoop(
    request: Readonly<CrawlRequest>,
    executor: HttpExecutor,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    const outcome = emptyOutcome(null);

    for (let attemptIndex = 0; ; attemptIndex++) {
      if (signal?.aborted) {
        outcome.failure = new CrawlError(CrawlErrorKind.CANCELLED, `Request cancelled: ${request.url}`);
        return outcome;
      }

      try {
        // A retry never goes back to the proxy that just failed while another is healthy
        const failedProxy = outcome.failure ? outcome.proxy : null;
        outcome.proxy = null;
        outcome.proxy = this.selectProxy(request, failedProxy);
        outcome.attempts++;
        outcome.exchange = await executor.execute(request, outcome.proxy, signal);
        outcome.failure = null;
      } catch (error: unknown) {
        const failure = classifyError(error, { viaProxy: outcome.proxy !== null });
        outcome.failure = failure;

        const decision = decideRetry(attemptIndex, failure, this.retryOptions);
        if (decision.action === 'stop') {
          return outcome;
        }

        this.logger.warn(
          `Attempt ${outcome.attempts}/${this.retryOptions.maxAttempts} for ${request.url} failed ` +
            `(${failure.kind}: ${failure.message}); retrying in ${decision.delayMs}ms`
        );
        await this.sleep(decision.delayMs, signal);
        continue;
      }

      try {
        outcome.extracted = this.extract(request, outcome.exchange);
      } catch (error: unknown) {
        outcome.failure = classifyError(error);
      }
      return outcome;
    }
  }

  /**
   * Per-request override first: a string is used as given, null forces a direct connection
   */
  private selectProxy(request: Readonly<CrawlRequest>, failedProxy: ProxyRecord | null): ProxyRecord | null {
    if (request.proxy === null) {
      return null;
    }

    if (typeof request.proxy === 'string') {
      try {
        return parseProxyAddress(request.proxy);
      } catch (error: unknown) {
        throw new CrawlError(CrawlErrorKind.INVALID_URL, errorMessage(error), { cause: error });
      }
    }

    return this.proxyPool.acquire({ exclude: failedProxy });
  }

  private extract(request: Readonly<CrawlRequest>, exchange: HttpExchangeResult): ExtractionResult {
    const contentType = exchange.headers['content-type'];
    if (!ExtractionPipeline.accepts(contentType)) {
      throw new CrawlError(CrawlErrorKind.EXTRACTION_FAILURE, `Unsupported content type: ${contentType}`, {
        statusCode: exchange.status,
        url: exchange.finalUrl,
      });
    }

    return this.pipeline.extract(
      exchange.body,
      exchange.finalUrl,
      request.extractionStrategy ?? this.config.extractionStrategy
    );
  }

  private respond(request: Readonly<CrawlRequest>, startedAt: number, outcome: AttemptOutcome): CrawlResponse {
    const { exchange, failure } = outcome;
    const extracted = failure ? null : outcome.extracted;

    const response: CrawlResponse = {
      request,
      url: exchange?.finalUrl ?? failure?.url ?? request.url,
      status: exchange?.status ?? failure?.statusCode ?? null,
      headers: exchange?.headers ?? {},
      elapsedMs: Date.now() - startedAt,
      attempts: outcome.attempts,
      proxy: outcome.proxy?.address ?? null,
      extracted,
      error: failure
        ? {
            kind: failure.kind,
            message: failure.message,
            ...(failure.statusCode !== undefined ? { statusCode: failure.statusCode } : {}),
            attempts: outcome.attempts,
          }
        : null,
      metadata: { ...(request.metadata ?? {}) },
    };

    if (failure) {
      this.failedCount++;
      this.logger.error(
        `Failed ${request.url} after ${outcome.attempts} attempt(s): ${failure.kind}: ${failure.message}`
      );
    } else {
      this.completedCount++;
      this.logger.debug(`Fetched ${response.url} (${response.status}) in ${response.elapsedMs}ms`);
    }

    return response;
  }
}

/**
 * Set up a crawler, run `fn`, and clean up on every exit path
 */
export async function useCrawler<T>(crawler: AsyncCrawler, fn: (crawler: AsyncCrawler) => Promise<T>): Promise<T> {
  await crawler.setup();
  try {
    return await fn(crawler);
  } finally {
    await crawler.cleanup();
  }
}

export function withCrawler<T>(
  config: CrawlerConfig,
  fn: (crawler: AsyncCrawler) => Promise<T>,
  deps: AsyncCrawlerDeps = {}
): Promise<T> {
  return useCrawler(new AsyncCrawler(config, deps), fn);
}

function emptyOutcome(failure: CrawlError | null): AttemptOutcome {
  return { attempts: 0, proxy: null, exchange: null, extracted: null, failure };
}

function freezeRequest(request: CrawlRequest): Readonly<CrawlRequest> {
  return Object.freeze({
    ...request,
    ...(request.headers ? { headers: Object.freeze({ ...request.headers }) } : {}),
    ...(request.cookies ? { cookies: Object.freeze({ ...request.cookies }) } : {}),
    ...(request.params ? { params: Object.freeze({ ...request.params }) } : {}),
    ...(request.metadata ? { metadata: Object.freeze({ ...request.metadata }) } : {}),
  });
}
