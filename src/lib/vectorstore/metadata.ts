/**
 * Index metadata formatting utilities
 */

import * as path from 'path';
import { Chunk } from '../../types/chunk';
import { SourceDocument } from '../../types/document';
import { IndexEntryMetadata } from '../../types/vector';

/**
 * Converts a chunk of a document into the metadata stored beside its vector
 */
export function formatMetadata(chunk: Chunk, document: SourceDocument): IndexEntryMetadata {
  return {
    chunkId: chunk.id,
    documentId: document.id,
    file: path.posix.basename(document.id),
    content: chunk.text,
    startIndex: chunk.startIndex,
    endIndex: chunk.endIndex,
    chunkIndex: chunk.chunkIndex,
    totalChunks: chunk.totalChunks,
    tokenCount: chunk.tokenCount,
  };
}
