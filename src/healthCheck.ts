/**
 * Health, configuration and model listing endpoints
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { errorResponse } from './lib/http/responses';
import { getPublicSettings, getSettings } from './types/config';
import { checkHealth, listModels } from './lib/llm/generation';
import { getIndexStatus } from './lib/rag/retrieval';
import * as logger from './lib/utils/logger';
import { trackEvent } from './lib/utils/telemetry';

/**
 * Liveness of the API process itself
 */
export async function health(
  _request: HttpRequest,
  _context: InvocationContext
): Promise<HttpResponseInit> {
  return {
    status: 200,
    jsonBody: { status: 'ok', model: getSettings().ollamaModel },
  };
}

/**
 * Reachability of the model runtime
 */
export async function ollamaHealth(
  _request: HttpRequest,
  _context: InvocationContext
): Promise<HttpResponseInit> {
  const host = getSettings().ollamaHost;
  const healthy = await checkHealth();

  trackEvent('HealthCheck.Ollama', { healthy: String(healthy) });

  if (!healthy) {
    return { status: 503, jsonBody: { status: 'unavailable', host } };
  }

  return { status: 200, jsonBody: { status: 'ok', host } };
}

/**
 * Whether a vector index has been published
 */
export async function ragHealth(
  _request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  try {
    const status = await getIndexStatus();

    return {
      status: 200,
      jsonBody: {
        rag_status: status.ready ? 'ready' : 'not_ready',
        ready: status.ready,
        entries: status.entryCount,
        generation: status.generation,
        dimension: status.dimension,
        embedding_model: status.embeddingModel,
      },
    };
  } catch (error) {
    logger.warn('RAG health check failed', { invocationId: context.invocationId });
    return errorResponse(error, context.functionName);
  }
}

export async function readConfig(
  _request: HttpRequest,
  _context: InvocationContext
): Promise<HttpResponseInit> {
  return { status: 200, jsonBody: getPublicSettings() };
}

/**
 * Models installed in the runtime; 503 when it is unreachable
 */
export async function models(
  _request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  try {
    const installed = await listModels();
    return {
      status: 200,
      jsonBody: {
        models: installed,
        default: getSettings().ollamaModel,
      },
    };
  } catch (error) {
    return errorResponse(error, context.functionName);
  }
}

app.http('health', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'health',
  handler: health,
});
app.http('healthOllama', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'health/ollama',
  handler: ollamaHealth,
});
app.http('healthRag', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'health/rag',
  handler: ragHealth,
});
app.http('config', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'config',
  handler: readConfig,
});
app.http('models', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'models',
  handler: models,
});
