/**
 * Sentry error tracking for the function app and the ingestion command
 *
 * Every helper is a no-op until SENTRY_DSN is configured.
 */

import * as Sentry from '@sentry/node';
import { nodeProfilingIntegration } from '@sentry/profiling-node';
import { getConfig } from '../../types/config';

let isInitialized = false;

/**
 * Initialize Sentry once per process, tagging events with the component
 */
export function initializeSentry(component: 'api' | 'ingestion' = 'api'): void {
  if (isInitialized) {
    return;
  }
  isInitialized = true;

  const dsn = getConfig('SENTRY_DSN', '');
  if (!dsn) {
    console.warn('[Sentry] SENTRY_DSN not configured. Error tracking disabled.');
    return;
  }

  const environment = getConfig('SENTRY_ENVIRONMENT', 'development');
  const sampleRate = environment === 'production' ? 0.1 : 1.0;

  try {
    Sentry.init({
      dsn,
      environment,
      release: getConfig('SENTRY_RELEASE', '') || undefined,
      tracesSampleRate: sampleRate,
      profilesSampleRate: sampleRate,
      integrations: [nodeProfilingIntegration()],
      maxBreadcrumbs: 50,
      attachStacktrace: true,
      initialScope: {
        tags: { component, ollamaModel: getConfig('OLLAMA_MODEL', 'unset') },
      },
    });

    console.info(`[Sentry] Error tracking initialized for ${component}`);
  } catch (error) {
    console.error('[Sentry] Failed to initialize:', error);
  }
}

export function isSentryEnabled(): boolean {
  return isInitialized && getConfig('SENTRY_DSN', '') !== '';
}

/**
 * @returns Sentry event ID, or undefined while disabled
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>
): string | undefined {
  return isSentryEnabled() ? Sentry.captureException(error, { extra: context }) : undefined;
}

/**
 * @returns Sentry event ID, or undefined while disabled
 */
export function captureMessage(
  message: string,
  level: Sentry.SeverityLevel = 'info',
  context?: Record<string, unknown>
): string | undefined {
  return isSentryEnabled() ? Sentry.captureMessage(message, { level, extra: context }) : undefined;
}

/**
 * Record a step (log line, ingestion phase, search) shown before a later error
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  if (isSentryEnabled()) {
    Sentry.addBreadcrumb({ message, category, level, data, timestamp: Date.now() / 1000 });
  }
}

export function setTag(key: string, value: string): void {
  if (isSentryEnabled()) {
    Sentry.setTag(key, value);
  }
}

export interface TransactionHandle {
  setStatus: (status: string) => void;
  finish: () => void;
}

/**
 * Start a transaction-like span for one handler invocation
 *
 * Sentry v8 manages spans itself; the handle records the final status as a
 * tag and a breadcrumb so handlers keep a single setStatus/finish flow.
 */
export function startTransaction(name: string, op: string): TransactionHandle | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  const startedAt = Date.now();
  let status = 'unknown';

  return {
    setStatus: (next: string) => {
      status = next;
    },
    finish: () => {
      Sentry.setTag('transaction.status', status);
      addBreadcrumb(`${name} finished`, op, status === 'ok' ? 'info' : 'warning', {
        status,
        durationMs: Date.now() - startedAt,
      });
    },
  };
}

/**
 * Send buffered events; called when the host or the command shuts down
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  return isSentryEnabled() ? Sentry.flush(timeout) : true;
}
