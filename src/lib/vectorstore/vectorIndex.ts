/**
 * In-memory vector index backed by hnswlib
 *
 * Vectors live in an HNSW graph (cosine space); label i maps to metadata[i].
 * An index with no entries has no graph and answers every search with [].
 */

import { HierarchicalNSW } from 'hnswlib-node';
import { IndexEntry, IndexEntryMetadata, SearchResult } from '../../types/vector';
import { VectorIndexError } from '../utils/errors';

const M = 16;
const EF_CONSTRUCTION = 200;
const MIN_EF_SEARCH = 50;

export class VectorIndex {
  private constructor(
    private readonly graph: HierarchicalNSW | null,
    private readonly entries: IndexEntryMetadata[],
    readonly dimension: number
  ) {}

  /**
   * Builds an index from vectors and their metadata
   *
   * @throws VectorIndexError if vectors disagree on dimension
   */
  static build(entries: IndexEntry[]): VectorIndex {
    if (entries.length === 0) {
      return VectorIndex.empty();
    }

    const dimension = entries[0].vector.length;
    if (dimension === 0) {
      throw new VectorIndexError('Cannot index zero-length vectors');
    }

    const graph = new HierarchicalNSW('cosine', dimension);
    graph.initIndex(entries.length, M, EF_CONSTRUCTION);

    entries.forEach((entry, label) => {
      if (entry.vector.length !== dimension) {
        throw new VectorIndexError(
          `Vector for ${entry.metadata.chunkId} has ${entry.vector.length} dimensions, expected ${dimension}`
        );
      }
      graph.addPoint(entry.vector, label);
    });

    return new VectorIndex(
      graph,
      entries.map((entry) => entry.metadata),
      dimension
    );
  }

  static empty(dimension = 0): VectorIndex {
    return new VectorIndex(null, [], dimension);
  }

  /**
   * Restores an index from a file written by write()
   *
   * @throws VectorIndexError if the file and metadata disagree
   */
  static async read(
    indexPath: string,
    metadata: IndexEntryMetadata[],
    dimension: number
  ): Promise<VectorIndex> {
    if (metadata.length === 0) {
      return VectorIndex.empty(dimension);
    }

    const graph = new HierarchicalNSW('cosine', dimension);
    try {
      await graph.readIndex(indexPath);
    } catch (err) {
      throw new VectorIndexError(
        `Failed to read vector index from ${indexPath}`,
        err instanceof Error ? err : new Error(String(err))
      );
    }

    const count = graph.getCurrentCount();
    if (count !== metadata.length) {
      throw new VectorIndexError(
        `Vector index holds ${count} entries but metadata describes ${metadata.length}`
      );
    }

    return new VectorIndex(graph, metadata, dimension);
  }

  get size(): number {
    return this.entries.length;
  }

  get metadata(): readonly IndexEntryMetadata[] {
    return this.entries;
  }

  /**
   * Writes the HNSW graph to disk; an empty index writes nothing
   */
  async write(indexPath: string): Promise<void> {
    if (!this.graph) {
      return;
    }
    await this.graph.writeIndex(indexPath);
  }

  /**
   * Returns the k entries closest to the query vector, best first
   *
   * @throws VectorIndexError if the query has the wrong dimension
   */
  search(vector: number[], k: number): SearchResult[] {
    if (!this.graph || this.entries.length === 0 || k <= 0) {
      return [];
    }

    if (vector.length !== this.dimension) {
      throw new VectorIndexError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dimension}`
      );
    }

    const neighbourCount = Math.min(k, this.entries.length);
    this.graph.setEf(Math.max(neighbourCount, MIN_EF_SEARCH));

    const { neighbors, distances } = this.graph.searchKnn(vector, neighbourCount);

    return neighbors
      .map((label, i) => ({
        ...this.entries[label],
        // cosine space reports 1 - similarity
        score: 1 - distances[i],
      }))
      .sort((a, b) => b.score - a.score);
  }
}
