import { Orchestrator, OrchestratorOptions } from '../../../services/orchestration/Orchestrator';
import { AdapterRegistry } from '../../../services/agents/AdapterRegistry';
import { RequestValidationError, SourceUnavailableError } from '../../../models/errors';
import { FakeAdapter, hangUntilAborted } from '../../helpers/adapters';
import { makeQuery, makeRaw, captureRejection } from '../../helpers/fixtures';

const options: OrchestratorOptions = {
  sourceTimeoutMs: 1000,
  maxAttempts: 3,
  retryBaseDelayMs: 0,
  retryBackoff: 2,
  maxResultsPerSource: 100
};

describe('Orchestrator', () => {
  let registry: AdapterRegistry;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    registry = new AdapterRegistry();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should collect outcomes in request order', async () => {
    registry.register(new FakeAdapter('alpha', async () => [
      makeRaw({ source: 'alpha', url: 'https://alpha.example.com/1' })
    ]));
    registry.register(new FakeAdapter('beta', async () => [
      makeRaw({ source: 'beta', url: 'https://beta.example.com/1' }),
      makeRaw({ source: 'beta', url: 'https://beta.example.com/2' })
    ]));

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['beta', 'alpha'] }));

    expect(bundle.outcomes.map(o => [o.source, o.status, o.results.length, o.attempts])).toEqual([
      ['beta', 'ok', 2, 1],
      ['alpha', 'ok', 1, 1]
    ]);
    expect(bundle.finishedAt.getTime()).toBeGreaterThanOrEqual(bundle.startedAt.getTime());
  });

  it('should pass the query to adapters', async () => {
    const adapter = new FakeAdapter('alpha', async () => []);
    registry.register(adapter);
    const dateRange = { start: new Date('2024-03-01T00:00:00Z'), end: new Date('2024-03-02T00:00:00Z') };

    await new Orchestrator(registry, options).run(makeQuery({
      keywords: ['rust', 'wasm'],
      sources: ['alpha'],
      detail: 'linker errors',
      dateRange
    }));

    expect(adapter.requests[0]).toEqual({ keywords: ['rust', 'wasm'], detail: 'linker errors', dateRange });
  });

  it('should isolate a failing source from the others', async () => {
    registry.register(new FakeAdapter('alpha', async () => [makeRaw({ source: 'alpha' })]));
    registry.register(new FakeAdapter('beta', async () => {
      throw new SourceUnavailableError('beta', 'auth', 'HTTP 401 from beta', 401);
    }));

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha', 'beta'] }));

    expect(bundle.outcomes[0].status).toBe('ok');
    expect(bundle.outcomes[1]).toMatchObject({
      source: 'beta',
      status: 'failed',
      results: [],
      attempts: 1,
      error: { code: 'source_unavailable', message: 'HTTP 401 from beta' }
    });
  });

  it('should retry 5xx responses but not other HTTP failures', async () => {
    const flaky = new FakeAdapter('alpha', async attempt => {
      if (attempt === 1) throw new SourceUnavailableError('alpha', 'http', 'HTTP 503 from alpha', 503);
      return [makeRaw({ source: 'alpha' })];
    });
    const missing = new FakeAdapter('beta', async () => {
      throw new SourceUnavailableError('beta', 'http', 'HTTP 404 from beta', 404);
    });
    registry.register(flaky);
    registry.register(missing);

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha', 'beta'] }));

    expect(bundle.outcomes[0]).toMatchObject({ status: 'ok', attempts: 2 });
    expect(bundle.outcomes[1]).toMatchObject({ status: 'failed', attempts: 1 });
    expect(missing.attempts).toBe(1);
  });

  it('should retry transient failures and keep only the successful attempt', async () => {
    const adapter = new FakeAdapter('alpha', async attempt => {
      if (attempt < 3) throw new SourceUnavailableError('alpha', 'network', `attempt ${attempt} failed`);
      return [makeRaw({ source: 'alpha' })];
    });
    registry.register(adapter);

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha'] }));

    expect(bundle.outcomes[0]).toMatchObject({ status: 'ok', attempts: 3 });
    expect(bundle.outcomes[0].results).toHaveLength(1);
  });

  it('should not retry errors that are not source failures', async () => {
    const adapter = new FakeAdapter('alpha', async () => {
      throw new TypeError('adapter bug');
    });
    registry.register(adapter);

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha'] }));

    expect(adapter.attempts).toBe(1);
    expect(bundle.outcomes[0]).toMatchObject({
      status: 'failed',
      attempts: 1,
      error: { code: 'unexpected', message: 'adapter bug' }
    });
  });

  it('should fail a source that exceeds its timeout without affecting the rest', async () => {
    registry.register(new FakeAdapter('slow', (_attempt, context) => hangUntilAborted(context.signal)));
    registry.register(new FakeAdapter('fast', async () => [makeRaw({ source: 'fast' })]));

    const bundle = await new Orchestrator(registry, { ...options, sourceTimeoutMs: 50 })
      .run(makeQuery({ sources: ['slow', 'fast'] }));

    expect(bundle.outcomes[0]).toMatchObject({
      source: 'slow',
      status: 'failed',
      attempts: 1,
      error: { code: 'source_unavailable', message: 'slow did not finish within 50ms' }
    });
    expect(bundle.outcomes[1]).toMatchObject({ source: 'fast', status: 'ok' });
  });

  it('should time out adapters that ignore their signal', async () => {
    registry.register(new FakeAdapter('stuck', () => new Promise(() => undefined)));

    const bundle = await new Orchestrator(registry, { ...options, sourceTimeoutMs: 30 })
      .run(makeQuery({ sources: ['stuck'] }));

    expect(bundle.outcomes[0].error?.message).toBe('stuck did not finish within 30ms');
  });

  it('should report sources still running at the query deadline', async () => {
    registry.register(new FakeAdapter('slow', (_attempt, context) => hangUntilAborted(context.signal)));
    registry.register(new FakeAdapter('fast', async () => [makeRaw({ source: 'fast' })]));

    const bundle = await new Orchestrator(registry, { ...options, sourceTimeoutMs: 5000 })
      .run(makeQuery({ sources: ['slow', 'fast'] }), { deadlineMs: 50 });

    expect(bundle.outcomes[0]).toMatchObject({
      status: 'failed',
      error: { code: 'source_unavailable', message: 'slow was still running when the query deadline expired' }
    });
    expect(bundle.outcomes[1].status).toBe('ok');
  });

  it('should mark results from a degraded run', async () => {
    registry.register(new FakeAdapter('alpha', async (_attempt, context) => {
      context.reportDegraded('scraped_fallback');
      context.reportDegraded('ignored_second_reason');
      return [makeRaw({ source: 'alpha', sourceMetadata: { host: 'example.com' } })];
    }));

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha'] }));

    expect(bundle.outcomes[0]).toMatchObject({ status: 'degraded', degradedReason: 'scraped_fallback' });
    expect(bundle.outcomes[0].results[0].sourceMetadata).toEqual({ host: 'example.com', confidence: 'degraded' });
  });

  it('should drop malformed results and repeated URLs, keeping the first occurrence', async () => {
    registry.register(new FakeAdapter('alpha', async () => [
      makeRaw({ source: 'alpha', url: 'https://example.com/a', content: 'first' }),
      makeRaw({ source: 'alpha', url: 'https://example.com/a', content: 'second' }),
      makeRaw({ source: 'beta', url: 'https://example.com/b' }),
      makeRaw({ source: 'alpha', url: 'https://example.com/c', title: '  ' }),
      makeRaw({ source: 'alpha', url: '/relative' }),
      makeRaw({ source: 'alpha', url: 'https://example.com/d' })
    ]));

    const bundle = await new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha'] }));

    expect(bundle.outcomes[0].results.map(r => [r.url, r.content])).toEqual([
      ['https://example.com/a', 'first'],
      ['https://example.com/d', '']
    ]);
  });

  it('should stop consuming at the per-source result cap', async () => {
    registry.register(new FakeAdapter('alpha', async () =>
      [1, 2, 3, 4].map(n => makeRaw({ source: 'alpha', url: `https://example.com/${n}` }))
    ));

    const bundle = await new Orchestrator(registry, { ...options, maxResultsPerSource: 2 })
      .run(makeQuery({ sources: ['alpha'] }));

    expect(bundle.outcomes[0].results.map(r => r.url)).toEqual(['https://example.com/1', 'https://example.com/2']);
  });

  it('should reject unknown sources before dispatching anything', async () => {
    const adapter = new FakeAdapter('alpha', async () => []);
    registry.register(adapter);

    const error = await captureRejection(new Orchestrator(registry, options).run(makeQuery({ sources: ['alpha', 'missing'] })));

    expect(error).toBeInstanceOf(RequestValidationError);
    expect(adapter.attempts).toBe(0);
  });

  it('should use the injected clock for bundle timestamps', async () => {
    registry.register(new FakeAdapter('alpha', async () => []));
    const clock = jest.fn()
      .mockReturnValueOnce(new Date('2024-03-01T09:00:00Z'))
      .mockReturnValueOnce(new Date('2024-03-01T09:00:02Z'));

    const bundle = await new Orchestrator(registry, options, clock).run(makeQuery({ sources: ['alpha'] }));

    expect(bundle.startedAt).toEqual(new Date('2024-03-01T09:00:00Z'));
    expect(bundle.finishedAt).toEqual(new Date('2024-03-01T09:00:02Z'));
  });
});
