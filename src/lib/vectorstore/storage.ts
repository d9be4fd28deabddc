/**
 * Persisted vector store layout
 *
 *   <storePath>/CURRENT                         name of the active generation
 *   <storePath>/generations/<gen>/index.bin     HNSW graph
 *   <storePath>/generations/<gen>/metadata.json entry metadata, label order
 *   <storePath>/generations/<gen>/manifest.json IndexManifest
 *
 * A generation directory is written completely before CURRENT is swapped to
 * it with a rename, so a reader resolving CURRENT always sees a finished
 * index and its matching metadata.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MIN_GENERATIONS_TO_KEEP } from '../../types/config';
import { IndexEntryMetadata, IndexManifest } from '../../types/vector';
import { VectorIndex } from './vectorIndex';
import { VectorIndexError, toError } from '../utils/errors';
import * as logger from '../utils/logger';

export const CURRENT_FILE = 'CURRENT';
export const GENERATIONS_DIR = 'generations';
export const INDEX_FILE = 'index.bin';
export const METADATA_FILE = 'metadata.json';
export const MANIFEST_FILE = 'manifest.json';

export type ManifestInfo = Omit<IndexManifest, 'generation' | 'dimension' | 'entryCount' | 'createdAt'>;

export interface LoadedIndex {
  index: VectorIndex;
  manifest: IndexManifest;
}

export function getGenerationPath(storePath: string, generation: string): string {
  return path.join(storePath, GENERATIONS_DIR, generation);
}

/**
 * Generation names sort chronologically: timestamp plus a random suffix
 */
export function createGenerationName(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:.]/g, '').replace('T', '-').replace('Z', '');
  const suffix = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
  return `${stamp}-${suffix}`;
}

/**
 * Reads the active generation name
 *
 * @returns The generation, or null when nothing has been published yet
 */
export async function readCurrentGeneration(storePath: string): Promise<string | null> {
  try {
    const content = await fs.promises.readFile(path.join(storePath, CURRENT_FILE), 'utf-8');
    const generation = content.trim();
    return generation.length > 0 ? generation : null;
  } catch (err) {
    if (isMissingFile(err)) {
      return null;
    }
    throw new VectorIndexError('Failed to read current index generation', toError(err));
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.promises.readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

function isManifest(value: unknown): value is IndexManifest {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.generation === 'string' &&
    typeof record.dimension === 'number' &&
    typeof record.entryCount === 'number' &&
    typeof record.embeddingModel === 'string' &&
    record.metric === 'cosine'
  );
}

function isMetadataList(value: unknown): value is IndexEntryMetadata[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item: unknown) =>
        typeof item === 'object' &&
        item !== null &&
        'chunkId' in item &&
        'content' in item &&
        'file' in item
    )
  );
}

/**
 * Writes a new generation and makes it current
 *
 * @param keepGenerations - Number of generations to keep on disk, including the new one
 * @returns The manifest of the published generation
 */
export async function publishIndex(
  storePath: string,
  index: VectorIndex,
  info: ManifestInfo,
  keepGenerations = 2
): Promise<IndexManifest> {
  const generation = createGenerationName();
  const generationPath = getGenerationPath(storePath, generation);

  const manifest: IndexManifest = {
    ...info,
    generation,
    dimension: index.dimension,
    entryCount: index.size,
    createdAt: new Date().toISOString(),
  };

  try {
    await fs.promises.mkdir(generationPath, { recursive: true });

    await index.write(path.join(generationPath, INDEX_FILE));
    await fs.promises.writeFile(
      path.join(generationPath, METADATA_FILE),
      JSON.stringify(index.metadata),
      'utf-8'
    );
    await fs.promises.writeFile(
      path.join(generationPath, MANIFEST_FILE),
      JSON.stringify(manifest, null, 2),
      'utf-8'
    );

    const pointerTmp = path.join(storePath, `${CURRENT_FILE}.${generation}.tmp`);
    await fs.promises.writeFile(pointerTmp, `${generation}\n`, 'utf-8');
    await fs.promises.rename(pointerTmp, path.join(storePath, CURRENT_FILE));
  } catch (err) {
    await fs.promises.rm(generationPath, { recursive: true, force: true });
    throw new VectorIndexError(`Failed to publish index generation ${generation}`, toError(err));
  }

  logger.info('Index generation published', {
    generation,
    entryCount: manifest.entryCount,
    dimension: manifest.dimension,
  });

  await pruneGenerations(storePath, generation, keepGenerations);

  return manifest;
}

/**
 * Removes old generation directories, never touching the current one
 *
 * At least MIN_GENERATIONS_TO_KEEP survive, so the generation a reader
 * resolved just before the swap is still on disk.
 */
export async function pruneGenerations(
  storePath: string,
  current: string,
  keepGenerations: number
): Promise<string[]> {
  const generationsRoot = path.join(storePath, GENERATIONS_DIR);
  const names = (await fs.promises.readdir(generationsRoot, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .reverse();

  const keep = new Set([current, ...names.slice(0, Math.max(keepGenerations, MIN_GENERATIONS_TO_KEEP))]);
  const removed: string[] = [];

  for (const name of names) {
    if (keep.has(name)) {
      continue;
    }
    try {
      await fs.promises.rm(path.join(generationsRoot, name), { recursive: true, force: true });
      removed.push(name);
    } catch (err) {
      logger.logError('Failed to remove old index generation', toError(err), { generation: name });
    }
  }

  if (removed.length > 0) {
    logger.debug('Pruned index generations', { removed });
  }

  return removed;
}

/**
 * Loads the manifest of a generation
 */
export async function readManifest(
  storePath: string,
  generation: string
): Promise<IndexManifest> {
  const manifestPath = path.join(getGenerationPath(storePath, generation), MANIFEST_FILE);
  let manifest: unknown;
  try {
    manifest = await readJson(manifestPath);
  } catch (err) {
    throw new VectorIndexError(`Failed to read manifest ${manifestPath}`, toError(err));
  }

  if (!isManifest(manifest)) {
    throw new VectorIndexError(`Manifest ${manifestPath} is malformed`);
  }

  return manifest;
}

/**
 * Loads the current generation
 *
 * @returns null when no generation has been published
 * @throws VectorIndexError if the generation's files are missing or inconsistent
 */
export async function loadIndex(storePath: string): Promise<LoadedIndex | null> {
  const generation = await readCurrentGeneration(storePath);
  if (!generation) {
    return null;
  }

  return loadGeneration(storePath, generation);
}

/**
 * Loads a specific generation
 */
export async function loadGeneration(
  storePath: string,
  generation: string
): Promise<LoadedIndex> {
  const generationPath = getGenerationPath(storePath, generation);
  const manifest = await readManifest(storePath, generation);

  let metadata: unknown;
  try {
    metadata = await readJson(path.join(generationPath, METADATA_FILE));
  } catch (err) {
    throw new VectorIndexError(`Failed to read metadata for generation ${generation}`, toError(err));
  }

  if (!isMetadataList(metadata)) {
    throw new VectorIndexError(`Metadata for generation ${generation} is malformed`);
  }

  if (metadata.length !== manifest.entryCount) {
    throw new VectorIndexError(
      `Generation ${generation} manifest lists ${manifest.entryCount} entries but metadata has ${metadata.length}`
    );
  }

  const index = await VectorIndex.read(
    path.join(generationPath, INDEX_FILE),
    metadata,
    manifest.dimension
  );

  return { index, manifest };
}
