/** Tests for error reporting: tags, redaction of candidate content and secrets, and the no-DSN path. */
import { afterEach, describe, it, expect, vi } from 'vitest';
import { captureError, flushSentry, initSentry, scrubEvent, setSentryForTests, type SentryLike } from '../lib/sentry.js';

function stubSentry() {
  const setTag = vi.fn((_key: string, _value: string) => {});
  const setExtra = vi.fn((_key: string, _value: unknown) => {});
  const init = vi.fn((_options: Parameters<SentryLike['init']>[0]) => {});
  const captureException = vi.fn((_err: unknown) => {});
  const flush = vi.fn(async (_timeoutMs?: number) => true);
  setSentryForTests({ init, withScope: (callback) => callback({ setTag, setExtra }), captureException, flush });
  return { setTag, setExtra, init, captureException, flush };
}

afterEach(() => {
  vi.unstubAllEnvs();
  setSentryForTests(undefined);
});

describe('captureError', () => {
  it('does nothing without SENTRY_DSN', () => {
    vi.stubEnv('SENTRY_DSN', '');
    const { captureException } = stubSentry();

    captureError(new Error('boom'), { applicationId: 'app-1' });

    expect(captureException).not.toHaveBeenCalled();
  });

  it('sends identifiers as tags and redacts candidate content from extras', () => {
    vi.stubEnv('SENTRY_DSN', 'https://public@sentry.example.test/1');
    const { setTag, setExtra, captureException } = stubSentry();
    const err = new Error('boom');

    captureError(err, {
      applicationId: 'app-1',
      stage: 'normalize_profile',
      extracted_data: { name: 'Jane Doe' },
      raw_response: 'JANE DOE\\nEXPERIENCE',
      apiKey: 'test-secret',
      attempt: 2,
    });

    expect(setTag.mock.calls).toEqual([['applicationId', 'app-1'], ['stage', 'normalize_profile']]);
    expect(setExtra.mock.calls).toEqual([
      ['extracted_data', '[REDACTED]'],
      ['raw_response', '[REDACTED]'],
      ['apiKey', '[REDACTED]'],
      ['attempt', 2],
    ]);
    expect(captureException).toHaveBeenCalledWith(err);
  });

  it('skips empty identifiers', () => {
    vi.stubEnv('SENTRY_DSN', 'https://public@sentry.example.test/1');
    const { setTag } = stubSentry();

    captureError(new Error('boom'), { applicationId: '', source: 'worker_loop' });

    expect(setTag.mock.calls).toEqual([['source', 'worker_loop']]);
  });
});

describe('scrubEvent', () => {
  it('redacts extras and breadcrumb data that carry secrets or resume content', () => {
    const event = scrubEvent({
      extra: { ANTHROPIC_API_KEY: 'test-secret', sections: { '1': ['JANE DOE'] }, path: '/api/resumes/upload' },
      breadcrumbs: [{ data: { Authorization: 'Bearer test-token', url: '/health' } }, { message: 'no data' }],
    });

    expect(event).toEqual({
      extra: { ANTHROPIC_API_KEY: '[REDACTED]', sections: '[REDACTED]', path: '/api/resumes/upload' },
      breadcrumbs: [{ data: { Authorization: '[REDACTED]', url: '/health' } }, { message: 'no data' }],
    });
  });
});

describe('initSentry', () => {
  it('installs the scrubber as beforeSend', () => {
    vi.stubEnv('SENTRY_DSN', 'https://public@sentry.example.test/1');
    vi.stubEnv('NODE_ENV', 'production');
    const { init } = stubSentry();

    initSentry();

    expect(init).toHaveBeenCalledWith({
      dsn: 'https://public@sentry.example.test/1',
      environment: 'production',
      tracesSampleRate: 0.1,
      beforeSend: scrubEvent,
    });
  });

  it('stays off when the DSN is missing', () => {
    vi.stubEnv('SENTRY_DSN', '');
    const { init } = stubSentry();

    initSentry();

    expect(init).not.toHaveBeenCalled();
  });
});

describe('flushSentry', () => {
  it('flushes with the given timeout', async () => {
    vi.stubEnv('SENTRY_DSN', 'https://public@sentry.example.test/1');
    const { flush } = stubSentry();

    await flushSentry(500);

    expect(flush).toHaveBeenCalledWith(500);
  });

  it('swallows a flush failure during shutdown', async () => {
    vi.stubEnv('SENTRY_DSN', 'https://public@sentry.example.test/1');
    const { flush } = stubSentry();
    flush.mockRejectedValueOnce(new Error('network down'));

    await expect(flushSentry()).resolves.toBeUndefined();
  });
});
