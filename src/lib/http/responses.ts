/**
 * Response helpers shared by the HTTP handlers
 */

import { ReadableStream } from 'stream/web';
import { TextEncoder } from 'util';
import { HttpResponseInit } from '@azure/functions';
import { StreamChunk } from '../../types/chat';
import {
  isIndexNotReadyError,
  isIngestionInProgressError,
  isInvalidRequestError,
  isServiceUnavailableError,
  toError,
} from '../utils/errors';
import { captureException } from '../utils/sentry';
import * as logger from '../utils/logger';

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
};

/**
 * HTTP status for an error raised while serving a request
 */
export function getErrorStatus(error: unknown): number {
  if (isInvalidRequestError(error)) return 400;
  if (isIngestionInProgressError(error)) return 409;
  if (isServiceUnavailableError(error)) return 503;
  if (isIndexNotReadyError(error)) return 503;
  return 500;
}

function getErrorLabel(error: unknown): string {
  if (isInvalidRequestError(error)) return 'Invalid request';
  if (isIngestionInProgressError(error)) return 'Ingestion in progress';
  if (isServiceUnavailableError(error)) return 'Service unavailable';
  if (isIndexNotReadyError(error)) return 'Index not ready';
  return 'Internal server error';
}

export function jsonError(status: number, error: string, message: string): HttpResponseInit {
  return { status, jsonBody: { error, message } };
}

/**
 * Converts an error into a JSON error response
 *
 * Only 500s are reported to Sentry; the rest are expected outcomes.
 */
export function errorResponse(error: unknown, functionName?: string): HttpResponseInit {
  const err = toError(error);
  const status = getErrorStatus(err);

  if (status === 500) {
    logger.logError(`${functionName ?? 'Request'} failed`, err, { status });
    captureException(err, { function: functionName ?? 'unknown' });
  } else {
    logger.warn(`${functionName ?? 'Request'} rejected`, { status, error: err.message });
  }

  return jsonError(status, getErrorLabel(err), err.message);
}

export function encodeEvent(chunk: StreamChunk): string {
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

/**
 * Streams text deltas as Server-Sent Events
 *
 * Emits start, one content event per delta, the optional sources, then done.
 * A failure mid-stream is reported as an error event and ends the stream; a
 * client disconnect stops reading the deltas and is reported through onError.
 */
export function sseResponse(
  deltas: AsyncIterable<string>,
  options: {
    sources?: StreamChunk['sources'];
    onComplete?: (text: string) => void;
    onError?: (error: Error) => void;
  } = {}
): HttpResponseInit {
  const encoder = new TextEncoder();
  let cancelled = false;

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      // the controller rejects writes once the client has gone away
      const send = (chunk: StreamChunk) => {
        if (!cancelled) {
          controller.enqueue(encoder.encode(encodeEvent(chunk)));
        }
      };
      let text = '';

      try {
        send({ type: 'start' });

        for await (const delta of deltas) {
          if (cancelled) {
            throw new Error('Client disconnected');
          }
          text += delta;
          send({ type: 'content', text: delta });
        }

        if (options.sources) {
          send({ type: 'sources', sources: options.sources });
        }

        send({ type: 'done' });
        options.onComplete?.(text);
      } catch (error) {
        const err = toError(error);
        options.onError?.(err);

        if (cancelled) {
          logger.warn('Stream cancelled by client', { received: text.length });
        } else {
          logger.logError('Error during streaming', err, { phase: 'streaming' });
          send({ type: 'error', error: err.message });
        }
      } finally {
        if (!cancelled) {
          controller.close();
        }
      }
    },

    cancel() {
      cancelled = true;
    },
  });

  return {
    status: 200,
    headers: SSE_HEADERS,
    body: stream,
  };
}
