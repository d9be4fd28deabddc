/**
 * Metadata stored alongside every vector in the index
 *
 * The vector with label `i` belongs to `metadata[i]`.
 */
export interface IndexEntryMetadata {
  chunkId: string;
  documentId: string;

  /** Basename of the source document */
  file: string;

  /** Chunk text */
  content: string;

  startIndex: number;
  endIndex: number;
  chunkIndex: number;
  totalChunks: number;
  tokenCount: number;
}

/**
 * A vector together with its metadata, as handed to the index builder
 */
export interface IndexEntry {
  vector: number[];
  metadata: IndexEntryMetadata;
}

export type DistanceMetric = 'cosine';

/**
 * Describes one published index generation
 */
export interface IndexManifest {
  generation: string;
  dimension: number;
  entryCount: number;
  documentCount: number;
  embeddingModel: string;
  metric: DistanceMetric;
  chunkSize: number;
  chunkOverlap: number;
  createdAt: string;
}

/**
 * A retrieved chunk with its similarity score (higher is closer)
 */
export interface SearchResult extends IndexEntryMetadata {
  score: number;
}
