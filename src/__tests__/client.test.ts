/**
 * Tests for the resilient client against an in-process mock dispatcher.
 */

import { describe, it, expect, afterAll, afterEach, beforeAll, vi } from 'vitest';
import { createServer, type Server } from 'node:http';
import { MockAgent, type Dispatcher } from 'undici';
import {
  ClientClosedError,
  ClientError,
  ConfigurationError,
  DEFAULT_USER_AGENT,
  InMemoryLogger,
  InMemoryMetricsCollector,
  InMemoryTracer,
  LogLevel,
  MetricNames,
  NotFoundError,
  RequestCancelledError,
  ServerError,
  TimeoutError,
  TransportError,
  UnexpectedError,
  createClient,
  type ClientOptions,
  type ResilientClient,
} from '../index.js';

const ORIGIN = 'https://api.test';
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const clients: ResilientClient[] = [];

function setup(options: Partial<ClientOptions> = {}) {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const logger = new InMemoryLogger();
  const metrics = new InMemoryMetricsCollector();
  const tracer = new InMemoryTracer();

  const client = createClient({
    baseUrl: ORIGIN,
    connection: agent,
    retry: { baseDelayMs: 10, maxDelayMs: 1000, jitterFactor: 0 },
    cache: { cleanupIntervalMs: 0 },
    logger,
    metrics,
    tracer,
    ...options,
  });
  clients.push(client);

  return { agent, mock: agent.get(ORIGIN), client, logger, metrics, tracer };
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

describe('ResilientClient', () => {
  describe('construction', () => {
    it('should reject a non-http base URL', () => {
      expect(() => createClient({ baseUrl: 'ftp://files.example.com' })).toThrow(ConfigurationError);
    });

    it('should log initialization without the credential', () => {
      const { logger } = setup({ credential: 'test-secret' });
      const [record] = logger.getLogsByLevel(LogLevel.Info);
      expect(record.message).toBe('Resilient client initialized');
      expect(record.context).toMatchObject({ baseUrl: ORIGIN, hasCredential: true });
      expect(JSON.stringify(logger.getLogs())).not.toContain('test-secret');
    });
  });

  describe('caching', () => {
    it('should answer a repeated GET from the cache with an identical payload', async () => {
      const { client, mock, metrics } = setup();
      const places = { places: [{ name: 'Fushimi Inari', distanceM: 120 }] };
      let networkCalls = 0;
      mock.intercept({ path: '/near?lat=35&lng=139', method: 'GET' }).reply(200, () => {
        networkCalls++;
        return places;
      });

      const first = await client.get('/near', { lat: 35.0, lng: 139.0 });
      const second = await client.get('/near', { lng: 139.0, lat: 35.0 });

      expect(networkCalls).toBe(1);
      expect(first).toEqual(places);
      expect(second).toEqual(first);
      expect(client.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
      expect(metrics.getCounter(MetricNames.CACHE_HITS, { method: 'GET' })).toBe(1);
      expect(metrics.getCounter(MetricNames.CACHE_MISSES, { method: 'GET' })).toBe(1);
    });

    it('should not consume a rate limiter token on a cache hit', async () => {
      const { client, mock } = setup({ rateLimit: { callsPerPeriod: 5, periodMs: 60000 } });
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 });

      await client.get('/weather');
      const tokensAfterFetch = client.getRateLimiter().getTokens();
      await client.get('/weather');

      expect(client.getRateLimiter().getTokens()).toBeGreaterThanOrEqual(tokensAfterFetch);
      expect(client.getRateLimiter().getStats().totalAcquired).toBe(1);
    });

    it('should key the cache on the query written into the endpoint', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/search?q=tea', method: 'GET' }).reply(200, { q: 'tea' });
      mock.intercept({ path: '/search?q=coffee', method: 'GET' }).reply(200, { q: 'coffee' });

      expect(await client.get('/search?q=tea')).toEqual({ q: 'tea' });
      expect(await client.get('/search?q=coffee')).toEqual({ q: 'coffee' });
      expect(await client.get('/search', { q: 'tea' })).toEqual({ q: 'tea' });
      expect(client.getCacheStats()).toMatchObject({ hits: 1, misses: 2, size: 2 });
    });

    it('should share an entry between requests that differ only by null params', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/near?lat=35', method: 'GET' }).reply(200, { places: [] });

      await client.get('/near', { lat: 35 });
      await client.get('/near', { lat: 35, region: null });

      expect(client.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    });

    it('should report cache entries and limiter tokens as gauges', async () => {
      const { client, mock, metrics } = setup({ rateLimit: { callsPerPeriod: 5, periodMs: 60000 } });
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 });

      await client.get('/weather');

      expect(metrics.getGauge(MetricNames.CACHE_ENTRIES)).toBe(1);
      expect(metrics.getGauge(MetricNames.RATE_LIMIT_TOKENS)).toBeCloseTo(4, 2);

      client.clearCache();
      expect(metrics.getGauge(MetricNames.CACHE_ENTRIES)).toBe(0);
    });

    it('should refresh the entry when skipCache is set', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 });
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 21 });

      expect(await client.get('/weather')).toEqual({ temp: 18 });
      expect(await client.get('/weather', undefined, { skipCache: true })).toEqual({ temp: 21 });
      expect(await client.get('/weather')).toEqual({ temp: 21 });
    });

    it('should cache null payloads', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/empty', method: 'GET' }).reply(200, '');

      expect(await client.get('/empty')).toBeNull();
      expect(await client.get('/empty')).toBeNull();
      expect(client.getCacheStats()?.hits).toBe(1);
    });

    it('should go to the network every time with caching disabled', async () => {
      const { client, mock } = setup({ cache: { enabled: false } });
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 }).times(2);

      await client.get('/weather');
      await client.get('/weather');

      expect(client.getCacheStats()).toBeUndefined();
    });

    it('should not cache non-GET requests', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/items', method: 'POST' }).reply(201, { id: 1 });
      mock.intercept({ path: '/items', method: 'POST' }).reply(201, { id: 2 });

      expect(await client.post('/items', { name: 'a' })).toEqual({ id: 1 });
      expect(await client.post('/items', { name: 'a' })).toEqual({ id: 2 });
      expect(client.getCacheStats()?.size).toBe(0);
    });
  });

  describe('retries', () => {
    it('should succeed on the third attempt after two server errors', async () => {
      const { client, mock, logger, metrics } = setup();
      mock.intercept({ path: '/flaky', method: 'GET' }).reply(500, 'boom');
      mock.intercept({ path: '/flaky', method: 'GET' }).reply(500, 'boom');
      mock.intercept({ path: '/flaky', method: 'GET' }).reply(200, { ok: true });

      const start = Date.now();
      const result = await client.get('/flaky');
      const elapsed = Date.now() - start;

      expect(result).toEqual({ ok: true });
      const retries = logger.getLogsByLevel(LogLevel.Warn);
      const delays = retries.map((record) => record.context.delayMs);
      expect(delays).toEqual([10, 20]);
      // Timers may fire up to 1ms early against Date.now on each sleep.
      expect(elapsed).toBeGreaterThanOrEqual(30 - 2);
      expect(retries.every((record) => UUID_V4.test(String(record.context.requestId)))).toBe(true);
      expect(metrics.getCounter(MetricNames.RETRIES, { method: 'GET' })).toBe(2);
    });

    it('should fail a 404 after exactly one attempt', async () => {
      const { client, mock, metrics } = setup();
      mock.intercept({ path: '/missing', method: 'GET' }).reply(404, 'not here');

      const error = await client.get('/missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toBeInstanceOf(ClientError);
      expect(error).toMatchObject({ statusCode: 404, attempts: 1, bodyExcerpt: 'not here', retryable: false });
      expect(metrics.getCounter(MetricNames.RETRIES, { method: 'GET' })).toBe(0);
      expect(metrics.getCounter(MetricNames.REQUESTS_FAILED, { method: 'GET' })).toBe(1);
    });

    it('should give up after maxRetries total attempts', async () => {
      const { client, mock, logger } = setup({ maxRetries: 2 });
      mock.intercept({ path: '/down', method: 'GET' }).reply(503, 'unavailable').times(2);

      const error = await client.get('/down').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ statusCode: 503, attempts: 2, bodyExcerpt: 'unavailable' });
      expect(logger.getMessages()).toContain('Request failed after all retry attempts');
    });

    it('should retry a 429 and honour Retry-After', async () => {
      const { client, mock, logger } = setup();
      mock
        .intercept({ path: '/busy', method: 'GET' })
        .reply(429, 'slow down', { headers: { 'retry-after': '0.05' } });
      mock.intercept({ path: '/busy', method: 'GET' }).reply(200, { ok: true });

      expect(await client.get('/busy')).toEqual({ ok: true });
      expect(logger.getLogsByLevel(LogLevel.Warn).map((record) => record.context.delayMs)).toEqual([50]);
    });

    it('should classify connection failures as retryable transport errors', async () => {
      const { client, mock } = setup({ maxRetries: 2 });
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
      mock.intercept({ path: '/offline', method: 'GET' }).replyWithError(refused).times(2);

      const error = await client.get('/offline').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ retryable: true, attempts: 2 });
    });

    it('should time out slow responses', async () => {
      const { client, mock } = setup({ timeoutMs: 50, maxRetries: 1 });
      mock.intercept({ path: '/slow', method: 'GET' }).reply(200, { ok: true }).delay(200);

      const error = await client.get('/slow').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ message: 'Request timeout after 50ms', attempts: 1, retryable: true });
    });

    it('should wrap unknown failures without retrying', async () => {
      let factoryCalls = 0;
      const { client } = setup({
        connection: undefined,
        connectionFactory: () => {
          factoryCalls++;
          throw new Error('factory exploded');
        },
      });

      const error = await client.get('/anything').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedError);
      expect(error).toMatchObject({ message: 'Unexpected error: factory exploded', attempts: 1 });
      expect(factoryCalls).toBe(1);
      expect(client.getHealth().connection.state).toBe('unset');
    });

    it('should stop when the caller aborts', async () => {
      const { client } = setup();
      const controller = new AbortController();
      controller.abort();

      const error = await client.get('/weather', undefined, { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(error).toMatchObject({ attempts: 1, retryable: false });
    });
  });

  describe('requests', () => {
    it('should merge headers with caller headers taking precedence', async () => {
      const { client, mock } = setup({ credential: 'test-secret', defaultHeaders: { 'X-Env': 'test' } });
      let captured: unknown;
      mock.intercept({ path: '/headers', method: 'GET' }).reply(200, (opts) => {
        captured = opts.headers;
        return {};
      });

      await client.get('/headers', undefined, { headers: { accept: 'text/plain' } });

      expect(captured).toEqual({
        'User-Agent': DEFAULT_USER_AGENT,
        accept: 'text/plain',
        'X-Env': 'test',
        Authorization: 'Bearer test-secret',
      });
    });

    it('should send JSON bodies', async () => {
      const { client, mock } = setup();
      let body: unknown;
      let headers: unknown;
      mock.intercept({ path: '/items', method: 'POST' }).reply(201, (opts) => {
        body = opts.body;
        headers = opts.headers;
        return { id: 7 };
      });

      expect(await client.post('/items', { name: 'lamp', tags: ['desk'] })).toEqual({ id: 7 });
      expect(body).toBe('{"name":"lamp","tags":["desk"]}');
      expect(headers).toMatchObject({ 'Content-Type': 'application/json' });
    });

    it('should send form bodies', async () => {
      const { client, mock } = setup();
      let body: unknown;
      let headers: unknown;
      mock.intercept({ path: '/token', method: 'POST' }).reply(200, (opts) => {
        body = opts.body;
        headers = opts.headers;
        return { token: 'placeholder' };
      });

      await client.request({ method: 'POST', endpoint: 'token', form: { grant: 'client', scope: 'read write' } });

      expect(body).toBe('grant=client&scope=read+write');
      expect(headers).toMatchObject({ 'Content-Type': 'application/x-www-form-urlencoded' });
    });

    it('should drop null and undefined query params', async () => {
      const { client, mock } = setup();
      let requestedPath: unknown;
      mock
        .intercept({ path: (path) => path.startsWith('/search'), method: 'GET' })
        .reply(200, (opts) => {
          requestedPath = opts.path;
          return [];
        });

      await client.get('/search', { q: 'tea', page: 2, region: null, sort: undefined });

      expect(requestedPath).toBe('/search?q=tea&page=2');
    });

    it('should wrap non-JSON success bodies', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/text', method: 'GET' }).reply(200, 'plain text');

      expect(await client.get('/text')).toEqual({ rawResponse: 'plain text' });
    });

    it('should support put, patch and delete', async () => {
      const { client, mock } = setup();
      mock.intercept({ path: '/items/1', method: 'PUT' }).reply(200, { id: 1, name: 'b' });
      mock.intercept({ path: '/items/1', method: 'PATCH' }).reply(200, { id: 1, name: 'c' });
      mock.intercept({ path: '/items/1', method: 'DELETE' }).reply(204, '');

      expect(await client.put('/items/1', { name: 'b' })).toEqual({ id: 1, name: 'b' });
      expect(await client.patch('/items/1', { name: 'c' })).toEqual({ id: 1, name: 'c' });
      expect(await client.delete('/items/1')).toBeNull();
    });

    it('should record a span per request', async () => {
      const { client, mock, tracer } = setup();
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 });

      await client.get('/weather');
      await client.get('/weather');

      const [fetched, cached] = tracer.getSpans();
      expect(fetched.name).toBe('http.GET');
      expect(fetched.status).toBe('ok');
      expect(fetched.attributes).toMatchObject({
        'http.method': 'GET',
        'http.url': `${ORIGIN}/weather`,
        'http.status_code': 200,
        'http.attempts': 1,
        'cache.hit': false,
      });
      expect(UUID_V4.test(String(fetched.attributes['request.id']))).toBe(true);
      expect(cached.attributes).toMatchObject({ 'cache.hit': true, 'http.attempts': 0 });
    });
  });

  describe('connection lifecycle', () => {
    it('should create one connection for concurrent first requests', async () => {
      const agent = new MockAgent();
      agent.disableNetConnect();
      agent
        .get(ORIGIN)
        .intercept({ path: /^\/items\/\d+$/, method: 'GET' })
        .reply(200, { ok: true })
        .persist();

      let created = 0;
      const { client } = setup({
        connection: undefined,
        connectionFactory: async (): Promise<Dispatcher> => {
          created++;
          await new Promise((resolve) => setTimeout(resolve, 10));
          return agent;
        },
      });

      await Promise.all([client.get('/items/1'), client.get('/items/2'), client.get('/items/3')]);

      expect(created).toBe(1);
      expect(client.getHealth().connection).toEqual({
        state: 'ready',
        owned: true,
        initializations: 1,
        requests: 3,
      });
    });

    it('should never close an injected connection', async () => {
      const { client, agent } = setup();
      const closeSpy = vi.spyOn(agent, 'close');

      await client.close();
      await client.close();

      expect(closeSpy).not.toHaveBeenCalled();
      expect(client.isClosed()).toBe(true);
    });

    it('should reject requests after close', async () => {
      const { client } = setup();
      await client.close();

      const error = await client.get('/weather').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ClientClosedError);
      expect(error).toMatchObject({ attempts: 0 });
    });

    it('should report health', async () => {
      const { client, mock } = setup({ rateLimit: { callsPerPeriod: 10, periodMs: 60000 } });
      mock.intercept({ path: '/weather', method: 'GET' }).reply(200, { temp: 18 });
      await client.get('/weather');

      const health = client.getHealth();
      expect(health.connection).toEqual({ state: 'ready', owned: false, initializations: 0, requests: 1 });
      expect(health.cache).toMatchObject({ size: 1, misses: 1 });
      expect(health.rateLimiter.waitTimeMs).toBe(0);
      expect(health.rateLimiter.tokens).toBeGreaterThanOrEqual(9);
      expect(health.rateLimiter.tokens).toBeLessThanOrEqual(10);
    });
  });

  describe('against a local server', () => {
    let server: Server;
    let origin: string;

    beforeAll(async () => {
      server = createServer((req, res) => {
        if (req.url === '/slow') {
          const timer = setTimeout(() => res.end('{"ok":true}'), 800);
          res.on('close', () => clearTimeout(timer));
          return;
        }
        res.setHeader('content-type', 'application/json');
        res.end('{"ok":true}');
      });
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('server did not bind a TCP port');
      }
      origin = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    it('should fetch through the default pool', async () => {
      const { client } = setup({ baseUrl: origin, connection: undefined });

      expect(await client.get('/ok')).toEqual({ ok: true });
      expect(client.getHealth().connection).toMatchObject({ state: 'ready', owned: true, requests: 1 });
    });

    it('should abort an in-flight request when the caller cancels', async () => {
      const { client } = setup({ baseUrl: origin, connection: undefined });
      const controller = new AbortController();
      const start = Date.now();
      setTimeout(() => controller.abort(), 25);

      const error = await client.get('/slow', undefined, { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(error).toMatchObject({ attempts: 1, retryable: false });
      expect(Date.now() - start).toBeLessThan(400);
    });

    it('should not retry a header value the transport rejects', async () => {
      const { client, metrics } = setup({ baseUrl: origin, connection: undefined });

      const error = await client
        .get('/ok', undefined, { headers: { 'x-bad': 'a\r\nb' } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedError);
      expect(error).toMatchObject({
        message: 'Unexpected error: invalid x-bad header',
        attempts: 1,
        retryable: false,
      });
      expect(metrics.getCounter(MetricNames.RETRIES, { method: 'GET' })).toBe(0);
    });
  });
});
