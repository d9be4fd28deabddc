/**
 * RAG retrieval logic for semantic search
 *
 * The published index is cached in memory and reloaded whenever the store's
 * CURRENT pointer names a different generation, so a running server picks up
 * new ingestion runs without a restart.
 */

import * as path from 'path';
import { getSettings } from '../../types/config';
import { SearchResult } from '../../types/vector';
import { generateEmbedding } from '../llm/embeddings';
import { LoadedIndex, loadGeneration, readCurrentGeneration } from '../vectorstore/storage';
import { formatContextFromChunks } from './prompts';
import { IndexNotReadyError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';

export interface IndexStatus {
  ready: boolean;
  generation: string | null;
  entryCount: number;
  dimension: number;
  embeddingModel: string | null;
}

export interface ContextOptions {
  topK?: number;
  maxContextLength?: number;
}

export interface RetrievalResult {
  context: string;
  chunks: SearchResult[];
  indexReady: boolean;
}

let cached: LoadedIndex | null = null;
let cachedStorePath: string | null = null;

function getStorePath(): string {
  return path.resolve(getSettings().vectorStorePath);
}

/**
 * Loads a generation named by CURRENT, following the pointer once more if an
 * ingestion run swapped and pruned it while it was being read
 */
async function loadPublishedGeneration(storePath: string, generation: string): Promise<LoadedIndex> {
  try {
    return await loadGeneration(storePath, generation);
  } catch (err) {
    const latest = await readCurrentGeneration(storePath);
    if (!latest || latest === generation) {
      throw err;
    }

    logger.warn('Index generation replaced while loading; retrying', { generation, latest });
    return loadGeneration(storePath, latest);
  }
}

/**
 * Returns the current index, loading it when the published generation changed
 *
 * @returns null when nothing has been published
 */
export async function getCurrentIndex(): Promise<LoadedIndex | null> {
  const storePath = getStorePath();
  const generation = await readCurrentGeneration(storePath);

  if (!generation) {
    if (cached) {
      logger.warn('Vector index pointer disappeared; dropping cached index', { storePath });
    }
    cached = null;
    return null;
  }

  if (cached && cachedStorePath === storePath && cached.manifest.generation === generation) {
    return cached;
  }

  const startTime = Date.now();
  const loaded = await loadPublishedGeneration(storePath, generation);
  trackDependency('loadIndex', 'VectorIndex', loaded.manifest.generation, Date.now() - startTime, true);

  logger.info('Loaded vector index', {
    generation: loaded.manifest.generation,
    entryCount: loaded.manifest.entryCount,
    dimension: loaded.manifest.dimension,
  });

  cached = loaded;
  cachedStorePath = storePath;
  return loaded;
}

/**
 * Forgets the cached index; for tests and after settings change
 */
export function resetIndexCache(): void {
  cached = null;
  cachedStorePath = null;
}

/**
 * Describes whether an index is available for queries
 */
export async function getIndexStatus(): Promise<IndexStatus> {
  const loaded = await getCurrentIndex();

  if (!loaded) {
    return { ready: false, generation: null, entryCount: 0, dimension: 0, embeddingModel: null };
  }

  return {
    ready: true,
    generation: loaded.manifest.generation,
    entryCount: loaded.manifest.entryCount,
    dimension: loaded.manifest.dimension,
    embeddingModel: loaded.manifest.embeddingModel,
  };
}

/**
 * Finds the chunks most similar to a query
 *
 * An index with no entries answers with [] without calling the embedding model.
 *
 * @throws IndexNotReadyError if no index has been published
 * @throws ServiceUnavailableError if the embedding model is unreachable
 */
export async function searchDocuments(
  query: string,
  topK: number = getSettings().retrievalTopK
): Promise<SearchResult[]> {
  const loaded = await getCurrentIndex();

  if (!loaded) {
    throw new IndexNotReadyError();
  }

  if (loaded.index.size === 0) {
    logger.info('Vector index is empty', { generation: loaded.manifest.generation });
    return [];
  }

  logger.info('Starting retrieval', { queryLength: query.length, topK });

  const embedding = await generateEmbedding(query);
  const results = loaded.index.search(embedding, topK);

  logger.info('Vector search completed', {
    chunksRetrieved: results.length,
    topScore: results[0]?.score,
  });

  return results;
}

/**
 * Retrieves context for a prompt
 *
 * A missing index is not an error here: the answer is generated without context.
 */
export async function getContextForQuery(
  query: string,
  options: ContextOptions = {}
): Promise<RetrievalResult> {
  const settings = getSettings();
  const topK = options.topK ?? settings.retrievalTopK;
  const maxContextLength = options.maxContextLength ?? settings.maxContextLength;

  let chunks: SearchResult[];
  try {
    chunks = await searchDocuments(query, topK);
  } catch (err) {
    if (err instanceof IndexNotReadyError) {
      logger.warn('Vector index not ready; answering without context');
      return { context: '', chunks: [], indexReady: false };
    }
    throw err;
  }

  const { context, used } = formatContextFromChunks(chunks, maxContextLength);

  return { context, chunks: used, indexReady: true };
}
