/**
 * HTTP endpoint for semantic search queries
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { errorResponse, getErrorStatus } from './lib/http/responses';
import { parseSearchRequest, readJsonBody } from './lib/http/validation';
import { searchDocuments } from './lib/rag/retrieval';
import { getContentPreview } from './lib/chunking/preprocessor';
import * as logger from './lib/utils/logger';
import { trackEvent, trackMetric } from './lib/utils/telemetry';
import { startTransaction, setTag, addBreadcrumb } from './lib/utils/sentry';

export interface SearchHit {
  score: number;
  file: string;
  documentId: string;
  chunkIndex: number;
  text: string;
}

export interface SearchResponse {
  results: SearchHit[];
  executionTime: number;
}

/**
 * Search the vector index using semantic similarity
 *
 * @returns Ranked chunks; 503 when no index has been published
 */
export async function searchEndpoint(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  const startTime = Date.now();

  const transaction = startTransaction('searchEndpoint', 'http.request');
  setTag('function', 'searchEndpoint');
  setTag('invocationId', context.invocationId);

  try {
    const { query, topK } = parseSearchRequest(await readJsonBody(request));

    logger.info('Semantic search request', { query: getContentPreview(query, 100), topK });
    addBreadcrumb('Searching vector index', 'search', 'info', { queryLength: query.length, topK });

    const matches = await searchDocuments(query, topK);

    const results: SearchHit[] = matches.map((match) => ({
      score: match.score,
      file: match.file,
      documentId: match.documentId,
      chunkIndex: match.chunkIndex,
      text: match.content,
    }));

    const executionTime = Date.now() - startTime;

    logger.info('Semantic search completed', {
      resultsCount: results.length,
      executionTime,
      topScore: results[0]?.score,
    });

    trackEvent(
      'SearchEndpoint.Success',
      { topK: String(topK ?? 'default') },
      { resultsCount: results.length, executionTime, topScore: results[0]?.score ?? 0 }
    );
    trackMetric('SearchEndpoint.RequestTime', executionTime);

    transaction?.setStatus('ok');
    transaction?.finish();

    const response: SearchResponse = { results, executionTime };
    return { status: 200, jsonBody: response };
  } catch (error) {
    const status = getErrorStatus(error);
    trackMetric('SearchEndpoint.RequestTime', Date.now() - startTime, { outcome: String(status) });

    transaction?.setStatus(status === 400 ? 'invalid_argument' : 'internal_error');
    transaction?.finish();

    return errorResponse(error, 'searchEndpoint');
  }
}

app.http('search', {
  methods: ['POST'],
  authLevel: 'anonymous',
  route: 'search',
  handler: searchEndpoint,
});
