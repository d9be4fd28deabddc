/**
 * Plain generation endpoints
 *
 * /generate takes a raw prompt, /chat a message history; neither consults the
 * vector index. Both answer with JSON or, when stream is set, Server-Sent Events.
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { errorResponse, getErrorStatus, sseResponse } from './lib/http/responses';
import { parseGenerateRequest, parseSimpleChatRequest, readJsonBody } from './lib/http/validation';
import {
  chatCompletion,
  generateCompletion,
  streamChatCompletion,
  streamCompletion,
} from './lib/llm/generation';
import { getChatModel } from './lib/llm/client';
import * as logger from './lib/utils/logger';
import { trackEvent, trackMetric } from './lib/utils/telemetry';
import { startTransaction, setTag } from './lib/utils/sentry';

/**
 * Generates text for a raw prompt
 */
export async function generateApi(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  const startTime = Date.now();

  const transaction = startTransaction('generateApi', 'http.request');
  setTag('function', 'generateApi');
  setTag('invocationId', context.invocationId);

  try {
    const { prompt, stream } = parseGenerateRequest(await readJsonBody(request));

    logger.info('Generate request received', { promptLength: prompt.length, stream });

    if (stream) {
      const deltas = await streamCompletion(prompt);

      return sseResponse(deltas, {
        onComplete: (text) => {
          trackMetric('GenerateApi.RequestTime', Date.now() - startTime, { stream: 'true' });
          logger.info('Generate stream completed', { responseLength: text.length });
          transaction?.setStatus('ok');
          transaction?.finish();
        },
        onError: () => {
          transaction?.setStatus('internal_error');
          transaction?.finish();
        },
      });
    }

    const result = await generateCompletion(prompt);
    const duration = Date.now() - startTime;

    logger.info('Generate request completed', {
      responseLength: result.text.length,
      completionTokens: result.completionTokens,
      executionTime: duration,
    });
    trackEvent('GenerateApi.Success', { model: result.model }, { durationMs: duration });
    trackMetric('GenerateApi.RequestTime', duration, { stream: 'false' });

    transaction?.setStatus('ok');
    transaction?.finish();

    return {
      status: 200,
      jsonBody: { model: result.model, response: result.text, done: true },
    };
  } catch (error) {
    transaction?.setStatus(getErrorStatus(error) === 400 ? 'invalid_argument' : 'internal_error');
    transaction?.finish();

    return errorResponse(error, 'generateApi');
  }
}

/**
 * Chat without retrieval
 */
export async function simpleChatApi(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  const startTime = Date.now();

  const transaction = startTransaction('simpleChatApi', 'http.request');
  setTag('function', 'simpleChatApi');
  setTag('invocationId', context.invocationId);

  try {
    const { messages, stream } = parseSimpleChatRequest(await readJsonBody(request));

    logger.info('Chat request received', { messagesCount: messages.length, stream });

    if (stream) {
      const deltas = await streamChatCompletion(messages);

      return sseResponse(deltas, {
        onComplete: () => {
          trackMetric('SimpleChatApi.RequestTime', Date.now() - startTime, { stream: 'true' });
          transaction?.setStatus('ok');
          transaction?.finish();
        },
        onError: () => {
          transaction?.setStatus('internal_error');
          transaction?.finish();
        },
      });
    }

    const result = await chatCompletion(messages);
    const duration = Date.now() - startTime;

    trackEvent('SimpleChatApi.Success', { model: result.model }, { durationMs: duration });
    trackMetric('SimpleChatApi.RequestTime', duration, { stream: 'false' });

    transaction?.setStatus('ok');
    transaction?.finish();

    return {
      status: 200,
      jsonBody: {
        model: result.model || getChatModel(),
        message: { role: 'assistant', content: result.text },
        done: true,
      },
    };
  } catch (error) {
    transaction?.setStatus(getErrorStatus(error) === 400 ? 'invalid_argument' : 'internal_error');
    transaction?.finish();

    return errorResponse(error, 'simpleChatApi');
  }
}

app.http('generate', {
  methods: ['POST'],
  authLevel: 'anonymous',
  route: 'generate',
  handler: generateApi,
});
app.http('chat', {
  methods: ['POST'],
  authLevel: 'anonymous',
  route: 'chat',
  handler: simpleChatApi,
});
