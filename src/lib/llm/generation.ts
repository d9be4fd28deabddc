/**
 * Text generation through the model runtime
 *
 * Streaming variants open the upstream stream before returning, so an
 * unreachable runtime fails the call itself rather than the first read.
 */

import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import {
  getLLMClient,
  getChatModel,
  getErrorStatus,
  isConnectionFailure,
  toServiceUnavailable,
  RUNTIME_NAME,
} from './client';
import { getSettings } from '../../types/config';
import { ChatMessage } from '../../types/chat';
import { GenerationError, toError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';

export interface GenerationResult {
  model: string;
  text: string;
  promptTokens?: number;
  completionTokens?: number;
}

export interface ModelInfo {
  id: string;
  ownedBy: string;
  created: number;
}

/**
 * Runs a runtime call, tracking it as a dependency and mapping failures
 *
 * @throws ServiceUnavailableError if the runtime is unreachable
 * @throws GenerationError for other failures
 */
async function callRuntime<T>(operation: string, call: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  const model = getChatModel();

  try {
    const result = await call();
    trackDependency(operation, RUNTIME_NAME, model, Date.now() - startTime, true, 200);
    return result;
  } catch (err) {
    const status = getErrorStatus(err);
    trackDependency(operation, RUNTIME_NAME, model, Date.now() - startTime, false, status);

    if (isConnectionFailure(err)) {
      const unavailable = toServiceUnavailable(err);
      logger.logError(`Model runtime unreachable during ${operation}`, unavailable);
      throw unavailable;
    }

    const generationError = new GenerationError(
      `Model runtime rejected ${operation} request`,
      toError(err),
      status
    );
    logger.logError(`${operation} failed`, generationError, { errorStatus: status, model });
    throw generationError;
  }
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

async function* textDeltas<T>(
  stream: AsyncIterable<T>,
  pick: (chunk: T) => string | null | undefined
): AsyncGenerator<string> {
  for await (const chunk of stream) {
    const text = pick(chunk);
    if (text) {
      yield text;
    }
  }
}

/**
 * Generates a completion for a raw prompt
 */
export async function generateCompletion(prompt: string): Promise<GenerationResult> {
  const client = getLLMClient();
  const model = getChatModel();

  logger.debug('Generating completion', { model, promptLength: prompt.length });

  const completion = await callRuntime('completion', () =>
    client.completions.create({ model, prompt, stream: false })
  );

  return {
    model: completion.model || model,
    text: completion.choices[0]?.text ?? '',
    promptTokens: completion.usage?.prompt_tokens,
    completionTokens: completion.usage?.completion_tokens,
  };
}

/**
 * Streams a completion for a raw prompt as text deltas
 */
export async function streamCompletion(prompt: string): Promise<AsyncIterable<string>> {
  const client = getLLMClient();
  const model = getChatModel();

  logger.debug('Streaming completion', { model, promptLength: prompt.length });

  const stream = await callRuntime('completion.stream', () =>
    client.completions.create({ model, prompt, stream: true })
  );

  return textDeltas(stream, (chunk) => chunk.choices[0]?.text);
}

/**
 * Generates a chat reply for a message history
 */
export async function chatCompletion(messages: ChatMessage[]): Promise<GenerationResult> {
  const client = getLLMClient();
  const model = getChatModel();

  logger.debug('Generating chat completion', { model, messagesCount: messages.length });

  const completion = await callRuntime('chat', () =>
    client.chat.completions.create({
      model,
      messages: messages.map(toMessageParam),
      stream: false,
    })
  );

  return {
    model: completion.model || model,
    text: completion.choices[0]?.message.content ?? '',
    promptTokens: completion.usage?.prompt_tokens,
    completionTokens: completion.usage?.completion_tokens,
  };
}

/**
 * Streams a chat reply as text deltas
 */
export async function streamChatCompletion(
  messages: ChatMessage[]
): Promise<AsyncIterable<string>> {
  const client = getLLMClient();
  const model = getChatModel();

  logger.debug('Streaming chat completion', { model, messagesCount: messages.length });

  const stream = await callRuntime('chat.stream', () =>
    client.chat.completions.create({
      model,
      messages: messages.map(toMessageParam),
      stream: true,
    })
  );

  return textDeltas(stream, (chunk) => chunk.choices[0]?.delta?.content);
}

/**
 * Lists the models installed in the runtime
 */
export async function listModels(): Promise<ModelInfo[]> {
  const client = getLLMClient();

  return callRuntime('models.list', async () => {
    const models: ModelInfo[] = [];
    for await (const model of client.models.list()) {
      models.push({ id: model.id, ownedBy: model.owned_by, created: model.created });
    }
    return models;
  });
}

/**
 * Checks whether the runtime answers within HEALTH_TIMEOUT_MS
 *
 * @returns false instead of throwing when the runtime is down
 */
export async function checkHealth(): Promise<boolean> {
  const client = getLLMClient();
  const startTime = Date.now();

  try {
    await client.models.list({ timeout: getSettings().healthTimeoutMs });
    trackDependency('health', RUNTIME_NAME, 'models.list', Date.now() - startTime, true, 200);
    return true;
  } catch (err) {
    trackDependency(
      'health',
      RUNTIME_NAME,
      'models.list',
      Date.now() - startTime,
      false,
      getErrorStatus(err)
    );
    logger.warn('Model runtime health check failed', {
      error: toError(err).message,
    });
    return false;
  }
}
