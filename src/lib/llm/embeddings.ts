/**
 * Embedding generation through the model runtime
 */

import {
  getLLMClient,
  getEmbeddingModel,
  getErrorStatus,
  isConnectionFailure,
  toServiceUnavailable,
  RUNTIME_NAME,
} from './client';
import { getSettings } from '../../types/config';
import { EmbeddingError, toError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';

/**
 * Maps a runtime failure to ServiceUnavailableError or EmbeddingError
 */
function wrapEmbeddingFailure(err: unknown, inputCount: number): Error {
  if (isConnectionFailure(err)) {
    const unavailable = toServiceUnavailable(err);
    logger.logError('Embedding request could not reach the model runtime', unavailable, {
      inputCount,
    });
    return unavailable;
  }

  const status = getErrorStatus(err);
  const embeddingError = new EmbeddingError('Failed to generate embedding', toError(err), status);
  logger.logError('Embedding generation failed', embeddingError, {
    errorStatus: status,
    inputCount,
  });
  return embeddingError;
}

/**
 * Requests embeddings for a batch of texts in a single call
 *
 * @returns One embedding per input, in input order
 * @throws ServiceUnavailableError if the runtime is unreachable
 * @throws EmbeddingError for other failures
 */
async function embedBatch(texts: string[]): Promise<number[][]> {
  const client = getLLMClient();
  const model = getEmbeddingModel();
  const startTime = Date.now();

  try {
    const response = await client.embeddings.create(
      {
        model,
        input: texts,
        encoding_format: 'float',
      },
      { timeout: getSettings().embeddingTimeoutMs }
    );

    trackDependency('embeddings', RUNTIME_NAME, model, Date.now() - startTime, true, 200, {
      inputCount: String(texts.length),
    });

    if (response.data.length !== texts.length) {
      throw new EmbeddingError(
        `Model runtime returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  } catch (err) {
    if (err instanceof EmbeddingError) {
      throw err;
    }

    trackDependency(
      'embeddings',
      RUNTIME_NAME,
      model,
      Date.now() - startTime,
      false,
      getErrorStatus(err)
    );

    throw wrapEmbeddingFailure(err, texts.length);
  }
}

/**
 * Generates an embedding for a single text
 *
 * @throws ServiceUnavailableError if the runtime is unreachable
 * @throws EmbeddingError for other failures
 */
export async function generateEmbedding(content: string): Promise<number[]> {
  logger.debug('Generating embedding', {
    contentLength: content.length,
    model: getEmbeddingModel(),
  });

  const [embedding] = await embedBatch([content]);

  logger.debug('Embedding generated successfully', {
    dimensions: embedding.length,
  });

  return embedding;
}

/**
 * Generates embeddings for many texts, batchSize inputs per request
 *
 * Batches are sent one after another.
 *
 * @param batchSize - Inputs per request (default: EMBEDDING_BATCH_SIZE)
 * @returns One embedding per input, in input order
 */
export async function generateEmbeddings(
  texts: string[],
  batchSize: number = getSettings().embeddingBatchSize
): Promise<number[][]> {
  const embeddings: number[][] = [];

  for (let offset = 0; offset < texts.length; offset += batchSize) {
    const batch = texts.slice(offset, offset + batchSize);

    logger.debug('Embedding batch', {
      offset,
      batchSize: batch.length,
      total: texts.length,
    });

    embeddings.push(...(await embedBatch(batch)));
  }

  return embeddings;
}

/**
 * Validates that an embedding is a non-empty array of finite numbers
 *
 * @param expectedDimensions - Required length, if known
 */
export function validateEmbedding(
  embedding: unknown,
  expectedDimensions?: number
): embedding is number[] {
  if (!Array.isArray(embedding) || embedding.length === 0) {
    logger.error('Embedding is not a non-empty array');
    return false;
  }

  if (expectedDimensions !== undefined && embedding.length !== expectedDimensions) {
    logger.error('Embedding has incorrect dimensions', {
      actual: embedding.length,
      expected: expectedDimensions,
    });
    return false;
  }

  if (!embedding.every((val) => typeof val === 'number' && Number.isFinite(val))) {
    logger.error('Embedding contains invalid values');
    return false;
  }

  return true;
}
