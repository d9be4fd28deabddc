/**
 * Chunking module exports
 */

export {
  chunkText,
  countTokens,
  cleanup,
  computeChunkWindows,
  reassembleChunks,
  validateChunkingConfig,
} from './chunker';
export { normalizeContent, isValidContent, getContentPreview } from './preprocessor';
export type { Chunk, ChunkingConfig, ChunkingResult } from '../../types/chunk';
