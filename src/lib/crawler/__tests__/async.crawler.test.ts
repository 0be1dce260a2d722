/**
 * Async Crawler Tests
 * Scheduler behavior against an in-process transport
 */

import { ExtractionStrategyType } from '../../extraction/extraction.types';
import { ProxyHealth } from '../../proxy/proxy.types';
import { AsyncCrawler, AsyncCrawlerDeps, withCrawler } from '../async.crawler';
import { CrawlErrorKind, CrawlerStateError } from '../crawler.errors';
import { CrawlerConfig } from '../crawler.types';
import { articleHtml, articleMarkdown, simplePage } from '../../../__tests__/helpers/fixtures';
import {
  delayed,
  FakeProber,
  hang,
  htmlResponse,
  mockLogger,
  networkError,
  ScriptedTransport,
} from '../../../__tests__/helpers/mocks';

function createCrawler(transport: ScriptedTransport, config: CrawlerConfig = {}, deps: AsyncCrawlerDeps = {}) {
  const sleep = jest.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
  const crawler = new AsyncCrawler(config, { transport, sleep, logger: mockLogger(), ...deps });
  return { crawler, sleep };
}

describe('AsyncCrawler', () => {
  describe('lifecycle', () => {
    it('should refuse to fetch before setup', () => {
      const { crawler } = createCrawler(new ScriptedTransport());
      expect(() => crawler.fetch({ url: 'https://example.com/' })).toThrow(CrawlerStateError);
    });

    it('should refuse a second setup', async () => {
      const { crawler } = createCrawler(new ScriptedTransport());
      await crawler.setup();
      await expect(crawler.setup()).rejects.toBeInstanceOf(CrawlerStateError);
      await crawler.cleanup();
    });

    it('should close the transport once, however often cleanup is called', async () => {
      const transport = new ScriptedTransport();
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      await crawler.cleanup();
      await crawler.cleanup();

      expect(transport.closeCalls).toBe(1);
      expect(() => crawler.fetch({ url: 'https://example.com/' })).toThrow(CrawlerStateError);
    });

    it('should wait for in-flight requests before closing', async () => {
      const transport = new ScriptedTransport().on(
        'https://example.com/slow',
        delayed(htmlResponse(simplePage('Slow', 'This page answers after a short delay.')), 20)
      );
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      let finished = false;
      const pending = crawler.fetch({ url: 'https://example.com/slow' }).then((response) => {
        finished = true;
        return response;
      });
      await crawler.cleanup();

      expect(finished).toBe(true);
      expect((await pending).error).toBeNull();
      expect(transport.closeCalls).toBe(1);
    });

    it('should validate proxies during setup', async () => {
      const prober = new FakeProber(new Set(['10.0.0.2']));
      const { crawler } = createCrawler(
        new ScriptedTransport(),
        { proxies: ['http://10.0.0.1:8080', 'http://10.0.0.2:8080'] },
        { prober }
      );

      await crawler.setup();

      expect(prober.probed).toEqual(['10.0.0.1', '10.0.0.2']);
      expect(crawler.proxyPool.stats().healthy).toBe(1);
      await crawler.cleanup();
    });
  });

  describe('fetch', () => {
    it('should fetch and extract a page', async () => {
      const transport = new ScriptedTransport().on('https://example.com/blog/post', htmlResponse(articleHtml));
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/blog/post', metadata: { batch: 7 } });

      expect(response.error).toBeNull();
      expect(response.status).toBe(200);
      expect(response.attempts).toBe(1);
      expect(response.proxy).toBeNull();
      expect(response.metadata).toEqual({ batch: 7 });
      expect(response.extracted?.strategy).toBe(ExtractionStrategyType.MARKDOWN);
      expect(response.extracted?.content).toBe(articleMarkdown);
      expect(response.extracted?.metadata.title).toBe('Sample Article');
      await crawler.cleanup();
    });

    it('should honor a per-request extraction strategy', async () => {
      const transport = new ScriptedTransport().on(
        'https://example.com/',
        htmlResponse(simplePage('Home', 'A paragraph that is long enough to keep.'))
      );
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({
        url: 'https://example.com/',
        extractionStrategy: ExtractionStrategyType.CONTENT,
      });

      expect(response.extracted?.content).toBe('A paragraph that is long enough to keep.');
      await crawler.cleanup();
    });

    it('should freeze the submitted request', async () => {
      const { crawler } = createCrawler(new ScriptedTransport());
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/', headers: { Accept: 'text/html' } });

      expect(Object.isFrozen(response.request)).toBe(true);
      expect(Object.isFrozen(response.request.headers)).toBe(true);
      await crawler.cleanup();
    });

    it('should retry a 5xx with backoff until the attempt budget runs out', async () => {
      const transport = new ScriptedTransport().on('https://example.com/down', htmlResponse('unavailable', 503));
      const { crawler, sleep } = createCrawler(transport, { maxRetries: 4 });
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/down' });

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
      expect(transport.exchanges).toHaveLength(4);
      expect(response.extracted).toBeNull();
      expect(response.status).toBe(503);
      expect(response.error).toEqual({
        kind: CrawlErrorKind.HTTP_STATUS,
        message: 'HTTP 503 from https://example.com/down',
        statusCode: 503,
        attempts: 4,
      });
      await crawler.cleanup();
    });

    it('should recover when a retry succeeds', async () => {
      const transport = new ScriptedTransport().on(
        'https://example.com/flaky',
        networkError('ECONNRESET'),
        htmlResponse(simplePage('Flaky', 'Second attempt delivered the page.'))
      );
      const { crawler, sleep } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/flaky' });

      expect(response.error).toBeNull();
      expect(response.attempts).toBe(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      await crawler.cleanup();
    });

    it('should not retry a 404', async () => {
      const transport = new ScriptedTransport().on('https://example.com/missing', htmlResponse('not found', 404));
      const { crawler, sleep } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/missing' });

      expect(response.attempts).toBe(1);
      expect(response.error?.kind).toBe(CrawlErrorKind.HTTP_STATUS);
      expect(sleep).not.toHaveBeenCalled();
      await crawler.cleanup();
    });

    it('should fail extraction for content that is not HTML', async () => {
      const transport = new ScriptedTransport().on('https://example.com/file.pdf', {
        status: 200,
        headers: { 'content-type': 'application/pdf' },
        body: '%PDF-1.4',
      });
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/file.pdf' });

      expect(response.status).toBe(200);
      expect(response.attempts).toBe(1);
      expect(response.error?.kind).toBe(CrawlErrorKind.EXTRACTION_FAILURE);
      expect(response.error?.message).toBe('Unsupported content type: application/pdf');
      await crawler.cleanup();
    });

    it('should report an invalid URL without touching the network', async () => {
      const transport = new ScriptedTransport();
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'mailto:someone@example.com' });

      expect(response.error?.kind).toBe(CrawlErrorKind.INVALID_URL);
      expect(response.status).toBeNull();
      expect(response.url).toBe('mailto:someone@example.com');
      expect(transport.exchanges).toHaveLength(0);
      await crawler.cleanup();
    });
  });

  describe('proxies', () => {
    const proxies = ['http://10.0.0.1:8080', 'http://10.0.0.2:8080'];

    it('should move to another proxy after a proxy failure', async () => {
      const transport = new ScriptedTransport();
      transport.on('https://example.com/', async (exchange) => {
        if (exchange.proxyUrl === 'http://10.0.0.1:8080') {
          throw networkError('ECONNREFUSED');
        }
        return htmlResponse(simplePage('Via proxy', 'Delivered through the second proxy.'));
      });
      const { crawler } = createCrawler(transport, { proxies }, { prober: new FakeProber(new Set(['10.0.0.1', '10.0.0.2'])) });
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/' });

      expect(response.error).toBeNull();
      expect(response.attempts).toBe(2);
      expect(response.proxy).toBe('http://10.0.0.2:8080');
      expect(transport.exchanges.map((exchange) => exchange.proxyUrl)).toEqual([
        'http://10.0.0.1:8080',
        'http://10.0.0.2:8080',
      ]);
      await crawler.cleanup();
    });

    it('should fail with proxy exhaustion when no proxy is healthy', async () => {
      const transport = new ScriptedTransport();
      const { crawler } = createCrawler(transport, { proxies }, { prober: new FakeProber(new Set()) });
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/' });

      expect(response.error?.kind).toBe(CrawlErrorKind.PROXY_EXHAUSTION);
      expect(transport.exchanges).toHaveLength(0);
      await crawler.cleanup();
    });

    it('should connect directly when a request opts out of proxies', async () => {
      const transport = new ScriptedTransport();
      const { crawler } = createCrawler(transport, { proxies }, { prober: new FakeProber(new Set()) });
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/', proxy: null });

      expect(response.error).toBeNull();
      expect(transport.exchanges[0].proxyUrl).toBeNull();
      await crawler.cleanup();
    });

    it('should use a per-request proxy as given', async () => {
      const transport = new ScriptedTransport();
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/', proxy: '10.9.9.9:3128' });

      expect(transport.exchanges[0].proxyUrl).toBe('http://10.9.9.9:3128');
      expect(response.proxy).toBe('10.9.9.9:3128');
      await crawler.cleanup();
    });

    it('should demote a proxy after repeated live failures', async () => {
      const transport = new ScriptedTransport().on('https://example.com/', networkError('ECONNRESET'));
      const { crawler } = createCrawler(
        transport,
        { proxies: ['http://10.0.0.1:8080'], maxRetries: 5, proxyFailureThreshold: 3 },
        { prober: new FakeProber(new Set(['10.0.0.1'])) }
      );
      await crawler.setup();

      const response = await crawler.fetch({ url: 'https://example.com/' });

      expect(transport.exchanges).toHaveLength(3);
      expect(response.error?.kind).toBe(CrawlErrorKind.PROXY_EXHAUSTION);
      expect(crawler.proxyPool.snapshot()[0].health).toBe(ProxyHealth.UNHEALTHY);
      await crawler.cleanup();
    });
  });

  describe('fetchMany', () => {
    it('should return results in input order even when one fails', async () => {
      const transport = new ScriptedTransport()
        .on('https://example.com/a', delayed(htmlResponse(simplePage('A', 'First page content here.')), 15))
        .on('https://example.com/b', htmlResponse('broken', 404))
        .on('https://example.com/c', htmlResponse(simplePage('C', 'Third page content here.')));
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const responses = await crawler.fetchMany([
        { url: 'https://example.com/a' },
        { url: 'https://example.com/b' },
        { url: 'https://example.com/c' },
      ]);

      expect(responses.map((response) => response.url)).toEqual([
        'https://example.com/a',
        'https://example.com/b',
        'https://example.com/c',
      ]);
      expect(responses[0].extracted?.metadata.title).toBe('A');
      expect(responses[1].error?.kind).toBe(CrawlErrorKind.HTTP_STATUS);
      expect(responses[1].extracted).toBeNull();
      expect(responses[2].extracted?.metadata.title).toBe('C');
      expect(crawler.stats()).toEqual({ inFlight: 0, pending: 0, completed: 2, failed: 1 });
      await crawler.cleanup();
    });

    it('should never exceed the concurrency limit', async () => {
      const transport = new ScriptedTransport(
        delayed(htmlResponse(simplePage('Page', 'Content for the concurrency check.')), 5)
      );
      const { crawler } = createCrawler(transport, { maxConcurrentRequests: 3 });
      await crawler.setup();

      const requests = Array.from({ length: 12 }, (_, index) => ({ url: `https://example.com/page/${index}` }));
      const responses = await crawler.fetchMany(requests);

      expect(responses).toHaveLength(12);
      expect(responses.every((response) => response.error === null)).toBe(true);
      expect(transport.maxActive).toBe(3);
      await crawler.cleanup();
    });

    it('should cancel waiting and in-flight requests when the signal aborts', async () => {
      const transport = new ScriptedTransport(hang);
      const { crawler } = createCrawler(transport, { maxConcurrentRequests: 1 });
      await crawler.setup();
      const controller = new AbortController();

      const pending = crawler.fetchMany(
        [{ url: 'https://example.com/first' }, { url: 'https://example.com/second' }],
        { signal: controller.signal }
      );
      setTimeout(() => controller.abort(), 10);
      const [first, second] = await pending;

      expect(first.error?.kind).toBe(CrawlErrorKind.CANCELLED);
      expect(first.attempts).toBe(1);
      expect(second.error?.kind).toBe(CrawlErrorKind.CANCELLED);
      expect(second.attempts).toBe(0);
      expect(crawler.stats().inFlight).toBe(0);
      await crawler.cleanup();
    });
  });

  describe('stream', () => {
    it('should yield responses in completion order', async () => {
      const transport = new ScriptedTransport()
        .on('https://example.com/slow', delayed(htmlResponse(simplePage('Slow', 'Slow page content.')), 30))
        .on('https://example.com/fast', htmlResponse(simplePage('Fast', 'Fast page content.')));
      const { crawler } = createCrawler(transport);
      await crawler.setup();

      const urls: string[] = [];
      for await (const response of crawler.stream([
        { url: 'https://example.com/slow' },
        { url: 'https://example.com/fast' },
      ])) {
        urls.push(response.url);
      }

      expect(urls).toEqual(['https://example.com/fast', 'https://example.com/slow']);
      await crawler.cleanup();
    });
  });
});

describe('withCrawler', () => {
  it('should set up, run and clean up', async () => {
    const transport = new ScriptedTransport();

    const status = await withCrawler(
      {},
      async (crawler) => (await crawler.fetch({ url: 'https://example.com/' })).status,
      { transport, logger: mockLogger() }
    );

    expect(status).toBe(200);
    expect(transport.closeCalls).toBe(1);
  });

  it('should clean up when the callback throws', async () => {
    const transport = new ScriptedTransport();

    await expect(
      withCrawler(
        {},
        async () => {
          throw new Error('caller failed');
        },
        { transport, logger: mockLogger() }
      )
    ).rejects.toThrow('caller failed');
    expect(transport.closeCalls).toBe(1);
  });
});
