/**
 * Fixed-size character chunking with overlap
 *
 * Chunks are plain windows over the normalized document: chunk i+1 starts
 * `overlap` characters before chunk i ends, and the last chunk ends exactly
 * at the end of the document. Token counts come from tiktoken and are
 * informational only.
 */

import { get_encoding, Tiktoken } from 'tiktoken';
import { Chunk, ChunkingConfig, ChunkingResult } from '../../types/chunk';
import { ChunkingError } from '../utils/errors';
import * as logger from '../utils/logger';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_OVERLAP = 200;
const ENCODING_NAME = 'cl100k_base';

// Singleton encoder instance (encoding is expensive to initialize)
let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  if (!encoder) {
    try {
      encoder = get_encoding(ENCODING_NAME);
      logger.debug('Tiktoken encoder initialized', { encoding: ENCODING_NAME });
    } catch (err) {
      logger.error('Failed to initialize tiktoken encoder', { error: err });
      throw new Error('Failed to initialize tiktoken encoder');
    }
  }
  return encoder;
}

/**
 * Counts tokens in text using tiktoken
 *
 * Special-token markers inside documents are counted as ordinary text.
 */
export function countTokens(text: string): number {
  if (!text) {
    return 0;
  }
  return getEncoder().encode(text, [], []).length;
}

/**
 * Validates chunk size and overlap
 *
 * @throws ChunkingError unless 0 <= overlap < chunkSize and both are integers
 */
export function validateChunkingConfig(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ChunkingError(`Overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ChunkingError(
      `Overlap (${overlap}) must be smaller than chunk size (${chunkSize})`
    );
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Computes the [start, end) windows covering a text of the given length
 *
 * When the content is passed, no window boundary falls inside a surrogate
 * pair.
 */
export function computeChunkWindows(
  length: number,
  chunkSize: number,
  overlap: number,
  content?: string
): Array<[number, number]> {
  validateChunkingConfig(chunkSize, overlap);

  const windows: Array<[number, number]> = [];
  let start = 0;

  while (start < length) {
    let end = Math.min(start + chunkSize, length);
    if (content && end < length && end - 1 > start && isHighSurrogate(content.charCodeAt(end - 1))) {
      end -= 1;
    }
    windows.push([start, end]);

    if (end === length) {
      break;
    }

    let next = end - overlap;
    if (content && next > 0 && isLowSurrogate(content.charCodeAt(next))) {
      next -= 1;
    }
    start = next > start ? next : end;
  }

  return windows;
}

/**
 * Splits content into overlapping chunks
 *
 * A document no longer than chunkSize yields exactly one chunk; empty content
 * yields none.
 *
 * @param content - Normalized document text
 */
export function chunkText(
  content: string,
  config: Partial<ChunkingConfig> = {}
): ChunkingResult {
  const chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = config.overlap ?? DEFAULT_OVERLAP;
  const documentId = config.documentId ?? 'inline';

  const windows = computeChunkWindows(content.length, chunkSize, overlap, content);

  if (windows.length === 0) {
    return {
      chunks: [],
      originalLength: content.length,
      totalTokens: 0,
      wasChunked: false,
    };
  }

  const chunks: Chunk[] = windows.map(([startIndex, endIndex], index) => {
    const text = content.slice(startIndex, endIndex);
    return {
      id: `${documentId}#${index}`,
      documentId,
      text,
      startIndex,
      endIndex,
      chunkIndex: index,
      totalChunks: windows.length,
      tokenCount: countTokens(text),
    };
  });

  const totalTokens = countTokens(content);

  logger.debug('Text chunking completed', {
    documentId,
    originalLength: content.length,
    chunkSize,
    overlap,
    chunksCreated: chunks.length,
    totalTokens,
  });

  return {
    chunks,
    originalLength: content.length,
    totalTokens,
    wasChunked: chunks.length > 1,
  };
}

/**
 * Rebuilds the document from its chunks by dropping each chunk's overlap prefix
 *
 * Useful for verifying that a chunk sequence covers its document exactly once.
 */
export function reassembleChunks(chunks: Chunk[]): string {
  let text = '';
  let covered = 0;

  for (const chunk of chunks) {
    text += chunk.text.slice(covered - chunk.startIndex);
    covered = chunk.endIndex;
  }

  return text;
}

/**
 * Frees the tiktoken encoder resources
 */
export function cleanup(): void {
  if (encoder) {
    encoder.free();
    encoder = null;
    logger.debug('Tiktoken encoder cleaned up');
  }
}
