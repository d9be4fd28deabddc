/**
 * Ingestion pipeline
 *
 * discover → load → chunk → embed → build index → publish
 *
 * Every run rebuilds the index from the whole document set and publishes it
 * as a new generation; a failed run publishes nothing and the previous
 * generation stays current.
 */

import * as path from 'path';
import { getSettings } from '../../types/config';
import { Chunk } from '../../types/chunk';
import { SourceDocument } from '../../types/document';
import { IndexEntry } from '../../types/vector';
import { discoverDocuments, loadDocument } from './loader';
import { chunkText, isValidContent } from '../chunking';
import { generateEmbeddings, validateEmbedding } from '../llm/embeddings';
import { getEmbeddingModel } from '../llm/client';
import { formatMetadata } from '../vectorstore/metadata';
import { VectorIndex } from '../vectorstore/vectorIndex';
import { publishIndex } from '../vectorstore/storage';
import {
  EmbeddingError,
  IngestionInProgressError,
  isDocumentError,
  toError,
} from '../utils/errors';
import { trackEvent, trackMetric } from '../utils/telemetry';
import { addBreadcrumb } from '../utils/sentry';
import * as logger from '../utils/logger';

export interface IngestionOptions {
  documentsPath?: string;
  vectorStorePath?: string;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface SkippedDocument {
  documentId: string;
  reason: string;
}

export interface IngestionReport {
  generation: string;
  documentsFound: number;
  documentsIngested: number;
  documentsSkipped: SkippedDocument[];
  chunksCreated: number;
  entryCount: number;
  dimension: number;
  durationMs: number;
}

export interface IngestionStatus {
  running: boolean;
  startedAt: string | null;
  lastReport: IngestionReport | null;
  lastError: string | null;
  lastFinishedAt: string | null;
}

const status: IngestionStatus = {
  running: false,
  startedAt: null,
  lastReport: null,
  lastError: null,
  lastFinishedAt: null,
};

/**
 * Snapshot of the current and last ingestion run
 */
export function getIngestionStatus(): IngestionStatus {
  return { ...status };
}

export function isIngestionRunning(): boolean {
  return status.running;
}

/**
 * Clears run history; for tests
 */
export function resetIngestionStatus(): void {
  status.running = false;
  status.startedAt = null;
  status.lastReport = null;
  status.lastError = null;
  status.lastFinishedAt = null;
}

interface PreparedDocument {
  document: SourceDocument;
  chunks: Chunk[];
}

async function prepareDocuments(
  documentsPath: string,
  chunkSize: number,
  chunkOverlap: number
): Promise<{ found: number; prepared: PreparedDocument[]; skipped: SkippedDocument[] }> {
  const discovered = await discoverDocuments(documentsPath);
  const prepared: PreparedDocument[] = [];
  const skipped: SkippedDocument[] = [];

  for (const entry of discovered) {
    let document: SourceDocument;
    try {
      document = await loadDocument(entry);
    } catch (err) {
      if (!isDocumentError(err)) {
        throw err;
      }
      logger.warn('Skipping unreadable document', {
        documentId: entry.id,
        error: err.originalError?.message ?? err.message,
      });
      skipped.push({ documentId: entry.id, reason: `unreadable: ${err.originalError?.message ?? err.message}` });
      continue;
    }

    if (!isValidContent(document.content)) {
      logger.warn('Skipping empty or malformed document', { documentId: document.id });
      skipped.push({ documentId: document.id, reason: 'empty or too short' });
      continue;
    }

    const { chunks } = chunkText(document.content, {
      chunkSize,
      overlap: chunkOverlap,
      documentId: document.id,
    });

    logger.debug('Document chunked', { documentId: document.id, chunks: chunks.length });
    prepared.push({ document, chunks });
  }

  return { found: discovered.length, prepared, skipped };
}

async function embedChunks(prepared: PreparedDocument[]): Promise<IndexEntry[]> {
  const pairs = prepared.flatMap(({ document, chunks }) =>
    chunks.map((chunk) => ({ document, chunk }))
  );

  if (pairs.length === 0) {
    return [];
  }

  const embeddings = await generateEmbeddings(pairs.map(({ chunk }) => chunk.text));
  const dimension = embeddings[0]?.length;

  return pairs.map(({ document, chunk }, i) => {
    const vector = embeddings[i];
    if (!validateEmbedding(vector, dimension)) {
      throw new EmbeddingError(`Invalid embedding returned for chunk ${chunk.id}`);
    }
    return { vector, metadata: formatMetadata(chunk, document) };
  });
}

/**
 * Runs a full ingestion and publishes the resulting index
 *
 * @throws IngestionInProgressError if another run is active
 * @throws DocumentError if the documents directory is missing
 * @throws ServiceUnavailableError or EmbeddingError if embedding fails
 */
export async function runIngestion(options: IngestionOptions = {}): Promise<IngestionReport> {
  if (status.running) {
    throw new IngestionInProgressError();
  }

  const settings = getSettings();
  const documentsPath = path.resolve(options.documentsPath ?? settings.documentsPath);
  const vectorStorePath = path.resolve(options.vectorStorePath ?? settings.vectorStorePath);
  const chunkSize = options.chunkSize ?? settings.chunkSize;
  const chunkOverlap = options.chunkOverlap ?? settings.chunkOverlap;

  const startTime = Date.now();
  status.running = true;
  status.startedAt = new Date(startTime).toISOString();

  logger.info('Ingestion started', { documentsPath, vectorStorePath, chunkSize, chunkOverlap });
  addBreadcrumb('Ingestion started', 'ingestion', 'info', { documentsPath });

  try {
    const { found, prepared, skipped } = await prepareDocuments(
      documentsPath,
      chunkSize,
      chunkOverlap
    );
    const chunksCreated = prepared.reduce((sum, { chunks }) => sum + chunks.length, 0);

    logger.info('Documents prepared', {
      documentsFound: found,
      documentsIngested: prepared.length,
      documentsSkipped: skipped.length,
      chunksCreated,
    });

    const entries = await embedChunks(prepared);
    const index = VectorIndex.build(entries);

    const manifest = await publishIndex(
      vectorStorePath,
      index,
      {
        documentCount: prepared.length,
        embeddingModel: getEmbeddingModel(),
        metric: 'cosine',
        chunkSize,
        chunkOverlap,
      },
      settings.indexGenerationsToKeep
    );

    const report: IngestionReport = {
      generation: manifest.generation,
      documentsFound: found,
      documentsIngested: prepared.length,
      documentsSkipped: skipped,
      chunksCreated,
      entryCount: manifest.entryCount,
      dimension: manifest.dimension,
      durationMs: Date.now() - startTime,
    };

    logger.info('Ingestion completed', { ...report, documentsSkipped: skipped.length });

    trackEvent(
      'Ingestion.Success',
      { generation: report.generation },
      {
        documentsIngested: report.documentsIngested,
        documentsSkipped: skipped.length,
        entryCount: report.entryCount,
        durationMs: report.durationMs,
      }
    );
    trackMetric('Ingestion.ChunksCreated', chunksCreated);

    status.lastReport = report;
    status.lastError = null;
    return report;
  } catch (err) {
    const error = toError(err);
    logger.logError('Ingestion failed', error, { documentsPath });
    trackEvent('Ingestion.Failure', { errorType: error.name, errorMessage: error.message });

    status.lastError = error.message;
    throw error;
  } finally {
    status.running = false;
    status.lastFinishedAt = new Date().toISOString();
  }
}
