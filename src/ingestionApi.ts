/**
 * Ingestion endpoints
 *
 * - POST /ingest - Rebuild the index from the documents directory
 * - GET /ingest/status - Current and last ingestion run
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { errorResponse, getErrorStatus } from './lib/http/responses';
import { getIngestionStatus, runIngestion } from './lib/ingestion/pipeline';
import { resetIndexCache } from './lib/rag/retrieval';
import * as logger from './lib/utils/logger';
import { startTransaction, setTag } from './lib/utils/sentry';
import { trackOperation } from './lib/utils/telemetry';

/**
 * Runs a full ingestion and answers with its report
 *
 * This worker's cached index is dropped afterwards so the next query loads
 * the new generation.
 */
export async function ingestHandler(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  const transaction = startTransaction('ingest', 'http.request');
  setTag('function', 'ingest');
  setTag('invocationId', context.invocationId);

  logger.info('Ingestion requested over HTTP', {
    method: request.method,
    functionName: context.functionName,
  });

  try {
    const report = await trackOperation('Ingestion.Http', () => runIngestion(), {
      invocationId: context.invocationId,
    });
    resetIndexCache();

    transaction?.setStatus('ok');
    return { status: 200, jsonBody: report };
  } catch (error) {
    transaction?.setStatus(getErrorStatus(error) === 409 ? 'already_exists' : 'internal_error');
    return errorResponse(error, 'ingest');
  } finally {
    transaction?.finish();
  }
}

export async function ingestStatusHandler(
  _request: HttpRequest,
  _context: InvocationContext
): Promise<HttpResponseInit> {
  const status = getIngestionStatus();

  return {
    status: 200,
    jsonBody: { ...status, timestamp: new Date().toISOString() },
  };
}

app.http('ingest', {
  methods: ['POST'],
  authLevel: 'anonymous',
  route: 'ingest',
  handler: ingestHandler,
});
app.http('ingestStatus', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'ingest/status',
  handler: ingestStatusHandler,
});
