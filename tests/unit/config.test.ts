/**
 * Unit tests for environment configuration
 */

import {
  getConfig,
  getNumberConfig,
  getPublicSettings,
  getSettings,
  resetSettings,
  validateConfig,
} from '../../src/types/config';
import { ConfigurationError } from '../../src/lib/utils/errors';

const originalEnv = process.env;

const CONFIG_KEYS = [
  'OLLAMA_HOST',
  'OLLAMA_MODEL',
  'EMBEDDING_MODEL',
  'VECTOR_STORE_PATH',
  'DOCUMENTS_PATH',
  'API_PORT',
  'CHUNK_SIZE',
  'CHUNK_OVERLAP',
  'RETRIEVAL_TOP_K',
  'API_BASE_URL',
  'MAX_CONTEXT_LENGTH',
  'INDEX_GENERATIONS_TO_KEEP',
];

describe('configuration', () => {
  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
    resetSettings();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetSettings();
  });

  describe('getConfig', () => {
    it('should fall back to the default when unset or empty', () => {
      expect(getConfig('OLLAMA_MODEL', 'llama3.1')).toBe('llama3.1');
      process.env.OLLAMA_MODEL = '';
      expect(getConfig('OLLAMA_MODEL', 'llama3.1')).toBe('llama3.1');
    });

    it('should throw when unset without a default', () => {
      expect(() => getConfig('OLLAMA_MODEL')).toThrow(ConfigurationError);
    });
  });

  describe('getNumberConfig', () => {
    it('should parse integers', () => {
      process.env.CHUNK_SIZE = '512';
      expect(getNumberConfig('CHUNK_SIZE', '1000')).toBe(512);
    });

    it('should reject non-integers and values below the minimum', () => {
      process.env.CHUNK_SIZE = '12.5';
      expect(() => getNumberConfig('CHUNK_SIZE', '1000')).toThrow(
        'Environment variable CHUNK_SIZE must be an integer >= 1, got "12.5"'
      );
      process.env.CHUNK_SIZE = '0';
      expect(() => getNumberConfig('CHUNK_SIZE', '1000')).toThrow(ConfigurationError);
    });
  });

  describe('getSettings', () => {
    it('should use the documented defaults', () => {
      expect(getSettings()).toMatchObject({
        ollamaHost: 'http://localhost:11434',
        ollamaModel: 'llama3.1',
        embeddingModel: 'nomic-embed-text',
        vectorStorePath: './data/vector_store',
        documentsPath: './data/documents',
        apiPort: 8000,
        chunkSize: 1000,
        chunkOverlap: 200,
        retrievalTopK: 5,
        maxContextLength: 2000,
      });
    });

    it('should strip trailing slashes from URLs', () => {
      process.env.OLLAMA_HOST = 'http://gpu-box:11434/';
      expect(getSettings().ollamaHost).toBe('http://gpu-box:11434');
    });

    it('should cache until reset', () => {
      const first = getSettings();
      process.env.OLLAMA_MODEL = 'mistral';
      expect(getSettings()).toBe(first);

      resetSettings();
      expect(getSettings().ollamaModel).toBe('mistral');
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
      process.env.CHUNK_SIZE = '200';
      process.env.CHUNK_OVERLAP = '200';
      expect(() => validateConfig()).toThrow(
        'CHUNK_OVERLAP (200) must be smaller than CHUNK_SIZE (200)'
      );
    });

    it('should keep at least two index generations', () => {
      expect(getSettings().indexGenerationsToKeep).toBe(2);

      resetSettings();
      process.env.INDEX_GENERATIONS_TO_KEEP = '1';
      expect(() => validateConfig()).toThrow(
        'Environment variable INDEX_GENERATIONS_TO_KEEP must be an integer >= 2, got "1"'
      );
    });

    it('should accept zero overlap', () => {
      process.env.CHUNK_OVERLAP = '0';
      expect(getSettings().chunkOverlap).toBe(0);
    });
  });

  describe('getPublicSettings', () => {
    it('should expose the snake_case subset', () => {
      expect(getPublicSettings()).toEqual({
        ollama_host: 'http://localhost:11434',
        ollama_model: 'llama3.1',
        embedding_model: 'nomic-embed-text',
        vector_store_path: './data/vector_store',
        api_base_url: 'http://localhost:8000',
        api_port: 8000,
        chunk_size: 1000,
        chunk_overlap: 200,
        retrieval_top_k: 5,
      });
    });
  });
});
