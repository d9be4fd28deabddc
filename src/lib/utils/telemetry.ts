/**
 * Application Insights custom telemetry
 *
 * Ingestion runs, model runtime calls and index loads are reported as events,
 * metrics and dependencies. The Functions host already records requests, so
 * request auto-collection stays off. Without a connection string every call
 * is a no-op.
 */

import * as appInsights from 'applicationinsights';
import { getConfig } from '../../types/config';

export const SeverityLevel = appInsights.Contracts.SeverityLevel;
export type SeverityLevel = appInsights.Contracts.SeverityLevel;

let telemetryClient: appInsights.TelemetryClient | null = null;
let isInitialized = false;

export function initializeTelemetry(): void {
  if (isInitialized) {
    return;
  }
  isInitialized = true;

  const connectionString = getConfig('APPLICATIONINSIGHTS_CONNECTION_STRING', '');
  if (!connectionString) {
    console.warn(
      '[Telemetry] APPLICATIONINSIGHTS_CONNECTION_STRING not configured. Custom telemetry disabled.'
    );
    return;
  }

  try {
    appInsights
      .setup(connectionString)
      .setAutoCollectRequests(false)
      .setAutoCollectDependencies(true)
      .setAutoCollectExceptions(true)
      .setAutoCollectConsole(false)
      .setUseDiskRetryCaching(true)
      .setSendLiveMetrics(false);
    appInsights.start();

    telemetryClient = appInsights.defaultClient;
    telemetryClient.context.tags[telemetryClient.context.keys.cloudRole] = 'rag-assistant';

    console.info('[Telemetry] Application Insights initialized');
  } catch (error) {
    console.error('[Telemetry] Failed to initialize Application Insights:', error);
  }
}

function getClient(): appInsights.TelemetryClient | null {
  initializeTelemetry();
  return telemetryClient;
}

export function trackEvent(
  name: string,
  properties?: Record<string, string>,
  measurements?: Record<string, number>
): void {
  getClient()?.trackEvent({ name, properties, measurements });
}

export function trackMetric(name: string, value: number, properties?: Record<string, string>): void {
  getClient()?.trackMetric({ name, value, properties });
}

/**
 * Record a call to something outside the process
 *
 * @param dependencyTypeName - 'Ollama' for model runtime calls, 'VectorIndex' for index loads
 * @param data - Model name or index generation
 * @param resultCode - Defaults to 0 on success and 1 on failure
 */
export function trackDependency(
  name: string,
  dependencyTypeName: string,
  data: string,
  duration: number,
  success: boolean,
  resultCode?: number,
  properties?: Record<string, string>
): void {
  getClient()?.trackDependency({
    name,
    dependencyTypeName,
    data,
    duration,
    success,
    resultCode: resultCode ?? (success ? 0 : 1),
    properties,
  });
}

export function trackException(exception: Error, properties?: Record<string, string>): void {
  getClient()?.trackException({ exception, properties });
}

export function trackTrace(
  message: string,
  severity: SeverityLevel = SeverityLevel.Information,
  properties?: Record<string, string>
): void {
  getClient()?.trackTrace({ message, severity, properties });
}

export function flushTelemetry(): Promise<void> {
  const client = getClient();
  if (!client) {
    return Promise.resolve();
  }
  return new Promise((resolve) => client.flush({ callback: () => resolve() }));
}

/**
 * Run an operation and report it as one event carrying its duration
 *
 * Failures are also tracked as exceptions and then rethrown.
 */
export async function trackOperation<T>(
  name: string,
  operation: () => Promise<T>,
  properties: Record<string, string> = {}
): Promise<T> {
  const startTime = Date.now();
  const outcome: Record<string, string> = { ...properties, success: 'true' };

  try {
    return await operation();
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    outcome.success = 'false';
    outcome.errorMessage = error.message;
    trackException(error, { ...properties, operation: name });
    throw err;
  } finally {
    trackEvent(name, outcome, { duration: Date.now() - startTime });
  }
}
