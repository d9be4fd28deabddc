/**
 * Chat API endpoint with RAG (Retrieval-Augmented Generation)
 *
 * Answers with the local chat model, grounded in the chunks retrieved from
 * the vector index. Without an index the answer is generated without context.
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { errorResponse, getErrorStatus, sseResponse } from './lib/http/responses';
import { parseRagChatRequest, readJsonBody } from './lib/http/validation';
import { getContextForQuery } from './lib/rag/retrieval';
import { buildRagMessages, formatSourcesForDisplay } from './lib/rag/prompts';
import { chatCompletion, streamChatCompletion } from './lib/llm/generation';
import * as logger from './lib/utils/logger';
import { trackEvent, trackMetric } from './lib/utils/telemetry';
import { startTransaction, setTag } from './lib/utils/sentry';

/**
 * RAG chat handler with optional streaming
 *
 * @returns JSON answer with sources, or an SSE stream ending in a sources event
 */
export async function chatApi(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  const startTime = Date.now();

  const transaction = startTransaction('chatApi', 'http.request');
  setTag('function', 'chatApi');
  setTag('invocationId', context.invocationId);

  try {
    const { message, conversationHistory = [], topK, stream } = parseRagChatRequest(
      await readJsonBody(request)
    );

    setTag('messageLength', message.length.toString());
    setTag('hasHistory', conversationHistory.length > 0 ? 'true' : 'false');

    logger.info('RAG chat request received', {
      messageLength: message.length,
      hasHistory: conversationHistory.length > 0,
      stream,
    });

    const retrieval = await getContextForQuery(message, { topK });

    logger.info('Context retrieved', {
      chunksRetrieved: retrieval.chunks.length,
      topScore: retrieval.chunks[0]?.score,
      indexReady: retrieval.indexReady,
    });

    const messages = buildRagMessages(retrieval.context, message, conversationHistory);
    const sources = formatSourcesForDisplay(retrieval.chunks);

    if (stream) {
      const deltas = await streamChatCompletion(messages);

      return sseResponse(deltas, {
        sources,
        onComplete: (text) => {
          const duration = Date.now() - startTime;
          logger.info('RAG chat stream completed', { responseLength: text.length, executionTime: duration });
          trackMetric('ChatApi.RequestTime', duration, { stream: 'true' });
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

    logger.info('RAG chat completed', {
      responseLength: result.text.length,
      promptTokens: result.promptTokens,
      completionTokens: result.completionTokens,
      executionTime: duration,
    });

    trackEvent(
      'ChatApi.Success',
      { indexReady: String(retrieval.indexReady) },
      { chunksUsed: retrieval.chunks.length, durationMs: duration }
    );
    trackMetric('ChatApi.RequestTime', duration, { stream: 'false' });

    transaction?.setStatus('ok');
    transaction?.finish();

    return {
      status: 200,
      jsonBody: {
        model: result.model,
        response: result.text,
        sources,
        indexReady: retrieval.indexReady,
        done: true,
      },
    };
  } catch (error) {
    transaction?.setStatus(getErrorStatus(error) === 400 ? 'invalid_argument' : 'internal_error');
    transaction?.finish();

    return errorResponse(error, 'chatApi');
  }
}

app.http('chatRag', {
  methods: ['POST'],
  authLevel: 'anonymous',
  route: 'chat/rag',
  handler: chatApi,
});
