import { createRequire } from 'node:module';
import logger from './logger.js';

type SentryEvent = Record<string, unknown>;

interface SentryScope {
  setTag: (key: string, value: string) => void;
  setExtra: (key: string, value: unknown) => void;
}

/** The slice of @sentry/node this service calls. */
export interface SentryLike {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: SentryEvent) => SentryEvent | null;
  }) => void;
  withScope: (callback: (scope: SentryScope) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
}

/**
 * Identifiers worth searching on in Sentry. Everything else in the context goes
 * into `extra`, minus candidate content.
 */
export interface ErrorContext {
  applicationId?: string;
  jobPostId?: string;
  stage?: string;
  source?: string;
  requestId?: string;
  [key: string]: unknown;
}

const TAG_KEYS = ['applicationId', 'jobPostId', 'stage', 'source', 'requestId'] as const;

// Resume text, the normalized profile and its vector stay out of error reports.
const CANDIDATE_CONTENT_KEYS = new Set([
  'extracted_data',
  'embedded_value',
  'analysis',
  'sections',
  'blocks',
  'profile',
  'resume_text',
  'raw_response',
  'content',
]);

const SECRET_KEY_PATTERN = /key|token|secret|password|authorization|dsn/i;

const REDACTED = '[REDACTED]';

const require = createRequire(import.meta.url);
let sentryModule: SentryLike | null | undefined;

function loadSentry(): SentryLike | null {
  if (sentryModule !== undefined) return sentryModule;
  try {
    const loaded = require('@sentry/node') as Partial<SentryLike>;
    sentryModule = typeof loaded.init === 'function'
      && typeof loaded.withScope === 'function'
      && typeof loaded.captureException === 'function'
      && typeof loaded.flush === 'function'
      ? (loaded as SentryLike)
      : null;
  } catch {
    // @sentry/node is an optional dependency
    sentryModule = null;
  }
  return sentryModule;
}

/** Replaces the lazily loaded @sentry/node; `undefined` restores lazy loading. */
export function setSentryForTests(module: SentryLike | null | undefined): void {
  sentryModule = module;
}

function shouldRedact(key: string): boolean {
  return CANDIDATE_CONTENT_KEYS.has(key) || SECRET_KEY_PATTERN.test(key);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null;
}

function redactInPlace(record: Record<string, unknown> | null): void {
  if (!record) return;
  for (const key of Object.keys(record)) {
    if (shouldRedact(key)) record[key] = REDACTED;
  }
}

/** Drops candidate content and credentials from `extra` and breadcrumb data. */
export function scrubEvent(event: SentryEvent): SentryEvent {
  redactInPlace(asRecord(event.extra));
  if (Array.isArray(event.breadcrumbs)) {
    for (const crumb of event.breadcrumbs) {
      redactInPlace(asRecord(asRecord(crumb)?.data));
    }
  }
  return event;
}

function activeSentry(): SentryLike | null {
  if (!process.env.SENTRY_DSN) return null;
  return loadSentry();
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set; Sentry disabled');
    return;
  }
  const Sentry = loadSentry();
  if (!Sentry) {
    logger.warn('Sentry requested but @sentry/node is not installed; continuing without Sentry');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend: scrubEvent,
  });
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context: ErrorContext = {}): void {
  const Sentry = activeSentry();
  if (!Sentry) return;

  Sentry.withScope((scope) => {
    const tagged = new Set<string>(TAG_KEYS);
    for (const key of TAG_KEYS) {
      const value = context[key];
      if (typeof value === 'string' && value) scope.setTag(key, value);
    }
    for (const [key, value] of Object.entries(context)) {
      if (tagged.has(key)) continue;
      scope.setExtra(key, shouldRedact(key) ? REDACTED : value);
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  const Sentry = activeSentry();
  if (!Sentry) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed during shutdown');
  }
}
