/**
 * Contiguous slice of a source document used as the unit of embedding and retrieval
 */
export interface Chunk {
  /** Stable identifier: `<documentId>#<chunkIndex>` */
  id: string;

  /** Identifier of the source document (relative path) */
  documentId: string;

  /** The text content of this chunk */
  text: string;

  /** Starting character position in the normalized document (inclusive) */
  startIndex: number;

  /** Ending character position in the normalized document (exclusive) */
  endIndex: number;

  /** Chunk sequence number (0-indexed) */
  chunkIndex: number;

  /** Total number of chunks from the document */
  totalChunks: number;

  /** Approximate token count for this chunk */
  tokenCount: number;
}

/**
 * Configuration for text chunking
 */
export interface ChunkingConfig {
  /** Target chunk length in characters */
  chunkSize: number;

  /** Characters shared by consecutive chunks; must be smaller than chunkSize */
  overlap: number;

  /** Document identifier stamped onto every chunk (default: 'inline') */
  documentId?: string;
}

/**
 * Result of chunking operation
 */
export interface ChunkingResult {
  /** Chunks in document order */
  chunks: Chunk[];

  /** Content length in characters */
  originalLength: number;

  /** Total tokens in the content */
  totalTokens: number;

  /** Whether the content was split into multiple chunks */
  wasChunked: boolean;
}
