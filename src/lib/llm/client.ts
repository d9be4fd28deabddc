/**
 * Model runtime client initialization
 *
 * Ollama serves an OpenAI-compatible API under /v1, so the official OpenAI
 * SDK is used for embeddings, completions, chat and model listing.
 */

import OpenAI, { APIConnectionError, APIError } from 'openai';
import { getSettings } from '../../types/config';
import { ServiceUnavailableError } from '../utils/errors';
import * as logger from '../utils/logger';

export const RUNTIME_NAME = 'ollama';

// Ollama ignores the key but the SDK requires one
const PLACEHOLDER_API_KEY = 'ollama';

let llmClient: OpenAI | null = null;

/**
 * Gets or creates a singleton client for the model runtime
 */
export function getLLMClient(): OpenAI {
  if (!llmClient) {
    const settings = getSettings();
    const baseURL = `${settings.ollamaHost}/v1`;

    logger.info('Initializing model runtime client', { baseURL });

    llmClient = new OpenAI({
      apiKey: PLACEHOLDER_API_KEY,
      baseURL,
      timeout: settings.generationTimeoutMs,
      maxRetries: 0, // errors surface to the caller as-is
    });
  }

  return llmClient;
}

/**
 * Drops the cached client so the next call picks up changed settings
 */
export function resetLLMClient(): void {
  llmClient = null;
}

export function getChatModel(): string {
  return getSettings().ollamaModel;
}

export function getEmbeddingModel(): string {
  return getSettings().embeddingModel;
}

/**
 * True when the runtime could not be reached at all (refused, DNS, timeout)
 */
export function isConnectionFailure(err: unknown): boolean {
  return err instanceof APIConnectionError;
}

/**
 * HTTP status of a runtime API error, if it carried one
 */
export function getErrorStatus(err: unknown): number | undefined {
  return err instanceof APIError ? err.status : undefined;
}

/**
 * Wraps a connection failure in ServiceUnavailableError
 */
export function toServiceUnavailable(err: unknown): ServiceUnavailableError {
  const cause = err instanceof Error ? err : new Error(String(err));
  return new ServiceUnavailableError(
    `Model runtime at ${getSettings().ollamaHost} is unreachable`,
    RUNTIME_NAME,
    cause
  );
}
