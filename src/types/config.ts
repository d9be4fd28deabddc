/**
 * Environment variable configuration
 *
 * The function app and the ingestion job both read their settings through
 * getSettings(), so a value set in the environment (local.settings.json or
 * .env) applies to both.
 */

import { ConfigurationError } from '../lib/utils/errors';

export interface EnvironmentConfig {
  // Model runtime (Ollama)
  OLLAMA_HOST: string;
  OLLAMA_MODEL: string;
  EMBEDDING_MODEL: string;

  // Storage
  VECTOR_STORE_PATH: string;
  DOCUMENTS_PATH: string;
  INDEX_GENERATIONS_TO_KEEP?: string;

  // Functions host
  API_BASE_URL: string;
  API_PORT: string;

  // Ingestion / retrieval
  CHUNK_SIZE?: string;
  CHUNK_OVERLAP?: string;
  EMBEDDING_BATCH_SIZE?: string;
  RETRIEVAL_TOP_K?: string;
  MAX_CONTEXT_LENGTH?: string;

  // Timeouts
  GENERATION_TIMEOUT_MS?: string;
  EMBEDDING_TIMEOUT_MS?: string;
  HEALTH_TIMEOUT_MS?: string;

  // Monitoring
  APPLICATIONINSIGHTS_CONNECTION_STRING?: string;
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_RELEASE?: string;
}

/**
 * Resolved settings shared by every entry point
 */
export interface Settings {
  ollamaHost: string;
  ollamaModel: string;
  embeddingModel: string;
  vectorStorePath: string;
  documentsPath: string;
  indexGenerationsToKeep: number;
  apiBaseUrl: string;
  apiPort: number;
  chunkSize: number;
  chunkOverlap: number;
  embeddingBatchSize: number;
  retrievalTopK: number;
  maxContextLength: number;
  generationTimeoutMs: number;
  embeddingTimeoutMs: number;
  healthTimeoutMs: number;
}

export const MIN_GENERATIONS_TO_KEEP = 2;

export const DEFAULTS = {
  OLLAMA_HOST: 'http://localhost:11434',
  OLLAMA_MODEL: 'llama3.1',
  EMBEDDING_MODEL: 'nomic-embed-text',
  VECTOR_STORE_PATH: './data/vector_store',
  DOCUMENTS_PATH: './data/documents',
  INDEX_GENERATIONS_TO_KEEP: '2',
  API_BASE_URL: 'http://localhost:8000',
  API_PORT: '8000',
  CHUNK_SIZE: '1000',
  CHUNK_OVERLAP: '200',
  EMBEDDING_BATCH_SIZE: '16',
  RETRIEVAL_TOP_K: '5',
  MAX_CONTEXT_LENGTH: '2000',
  GENERATION_TIMEOUT_MS: '120000',
  EMBEDDING_TIMEOUT_MS: '180000',
  HEALTH_TIMEOUT_MS: '5000',
} satisfies Partial<Record<keyof EnvironmentConfig, string>>;

/**
 * Validates that the configured values can be resolved into Settings
 * @throws ConfigurationError describing the first invalid value
 */
export function validateConfig(): void {
  resolveSettings();
}

/**
 * Gets configuration value from environment with default fallback
 */
export function getConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue?: string
): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is not set`, key);
  }
  return value;
}

/**
 * Gets an integer configuration value
 *
 * @param min - Smallest accepted value (default: 1)
 * @throws ConfigurationError if the value is not an integer >= min
 */
export function getNumberConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue: string,
  min = 1
): number {
  const raw = getConfig(key, defaultValue).trim();
  const value = Number(raw);

  if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    throw new ConfigurationError(
      `Environment variable ${key} must be an integer >= ${min}, got "${raw}"`,
      key
    );
  }

  return value;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function resolveSettings(): Settings {
  const chunkSize = getNumberConfig('CHUNK_SIZE', DEFAULTS.CHUNK_SIZE);
  const chunkOverlap = getNumberConfig('CHUNK_OVERLAP', DEFAULTS.CHUNK_OVERLAP, 0);

  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CHUNK_SIZE (${chunkSize})`,
      'CHUNK_OVERLAP'
    );
  }

  return {
    ollamaHost: trimTrailingSlash(getConfig('OLLAMA_HOST', DEFAULTS.OLLAMA_HOST)),
    ollamaModel: getConfig('OLLAMA_MODEL', DEFAULTS.OLLAMA_MODEL),
    embeddingModel: getConfig('EMBEDDING_MODEL', DEFAULTS.EMBEDDING_MODEL),
    vectorStorePath: getConfig('VECTOR_STORE_PATH', DEFAULTS.VECTOR_STORE_PATH),
    documentsPath: getConfig('DOCUMENTS_PATH', DEFAULTS.DOCUMENTS_PATH),
    // the previous generation stays on disk for readers that resolved it before a swap
    indexGenerationsToKeep: getNumberConfig(
      'INDEX_GENERATIONS_TO_KEEP',
      DEFAULTS.INDEX_GENERATIONS_TO_KEEP,
      MIN_GENERATIONS_TO_KEEP
    ),
    apiBaseUrl: trimTrailingSlash(getConfig('API_BASE_URL', DEFAULTS.API_BASE_URL)),
    apiPort: getNumberConfig('API_PORT', DEFAULTS.API_PORT),
    chunkSize,
    chunkOverlap,
    embeddingBatchSize: getNumberConfig('EMBEDDING_BATCH_SIZE', DEFAULTS.EMBEDDING_BATCH_SIZE),
    retrievalTopK: getNumberConfig('RETRIEVAL_TOP_K', DEFAULTS.RETRIEVAL_TOP_K),
    maxContextLength: getNumberConfig('MAX_CONTEXT_LENGTH', DEFAULTS.MAX_CONTEXT_LENGTH),
    generationTimeoutMs: getNumberConfig('GENERATION_TIMEOUT_MS', DEFAULTS.GENERATION_TIMEOUT_MS),
    embeddingTimeoutMs: getNumberConfig('EMBEDDING_TIMEOUT_MS', DEFAULTS.EMBEDDING_TIMEOUT_MS),
    healthTimeoutMs: getNumberConfig('HEALTH_TIMEOUT_MS', DEFAULTS.HEALTH_TIMEOUT_MS),
  };
}

let cachedSettings: Settings | null = null;

/**
 * Returns the cached settings, resolving them from the environment on first use
 */
export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = resolveSettings();
  }
  return cachedSettings;
}

/**
 * Drops the cached settings so the next getSettings() call re-reads the environment
 */
export function resetSettings(): void {
  cachedSettings = null;
}

/**
 * Subset of settings that is safe to expose over HTTP
 */
export function getPublicSettings(
  settings: Settings = getSettings()
): Record<string, string | number> {
  return {
    ollama_host: settings.ollamaHost,
    ollama_model: settings.ollamaModel,
    embedding_model: settings.embeddingModel,
    vector_store_path: settings.vectorStorePath,
    api_base_url: settings.apiBaseUrl,
    api_port: settings.apiPort,
    chunk_size: settings.chunkSize,
    chunk_overlap: settings.chunkOverlap,
    retrieval_top_k: settings.retrievalTopK,
  };
}
