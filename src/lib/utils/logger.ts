/**
 * Structured logging utilities
 *
 * Console output mirrored to Application Insights traces and Sentry.
 */

import { trackTrace, trackException, SeverityLevel } from './telemetry';
import { captureException, captureMessage, addBreadcrumb } from './sentry';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

interface LogContext {
  [key: string]: unknown;
}

/**
 * Error objects lose their fields under JSON.stringify; flatten them first
 */
function serializeContext(context: LogContext): string {
  return JSON.stringify(context, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });
}

/**
 * Formats a log message with timestamp and context
 */
function formatLogMessage(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | ${serializeContext(context)}` : '';
  return `[${timestamp}] [${level}] ${message}${contextStr}`;
}

/**
 * Convert LogContext to string properties for Application Insights
 */
function contextToProperties(context?: LogContext): Record<string, string> | undefined {
  if (!context) return undefined;

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    properties[key] =
      typeof value === 'object' && value !== null ? serializeContext({ value }) : String(value);
  }
  return properties;
}

export function debug(message: string, context?: LogContext): void {
  const formattedMessage = formatLogMessage(LogLevel.DEBUG, message, context);
  console.debug(formattedMessage);
  trackTrace(message, SeverityLevel.Verbose, contextToProperties(context));

  addBreadcrumb(message, 'debug', 'debug', context);
}

export function info(message: string, context?: LogContext): void {
  const formattedMessage = formatLogMessage(LogLevel.INFO, message, context);
  console.info(formattedMessage);
  trackTrace(message, SeverityLevel.Information, contextToProperties(context));

  addBreadcrumb(message, 'info', 'info', context);
}

export function warn(message: string, context?: LogContext): void {
  const formattedMessage = formatLogMessage(LogLevel.WARN, message, context);
  console.warn(formattedMessage);
  trackTrace(message, SeverityLevel.Warning, contextToProperties(context));

  captureMessage(message, 'warning', context);
}

export function error(message: string, context?: LogContext): void {
  const formattedMessage = formatLogMessage(LogLevel.ERROR, message, context);
  console.error(formattedMessage);
  trackTrace(message, SeverityLevel.Error, contextToProperties(context));

  captureMessage(message, 'error', context);
}

/**
 * Log error with full error object details
 */
export function logError(message: string, err: Error, context?: LogContext): void {
  const errorContext = {
    ...context,
    errorName: err.name,
    errorMessage: err.message,
    errorStack: err.stack,
  };
  const formattedMessage = formatLogMessage(LogLevel.ERROR, message, errorContext);
  console.error(formattedMessage);
  trackTrace(message, SeverityLevel.Error, contextToProperties(errorContext));

  trackException(err, contextToProperties(context));
  captureException(err, context);
}
