/**
 * Request body validation
 *
 * Each parser narrows an unknown JSON body to its request type or throws
 * InvalidRequestError with a message naming the offending field.
 */

import { HttpRequest } from '@azure/functions';
import {
  ChatMessage,
  GenerateRequest,
  RagChatRequest,
  SearchRequest,
  SimpleChatRequest,
} from '../../types/chat';
import { InvalidRequestError } from '../utils/errors';

const MAX_TOP_K = 50;

/**
 * Reads the request body as JSON
 *
 * @throws InvalidRequestError if the body is empty or not valid JSON
 */
export async function readJsonBody(request: HttpRequest): Promise<unknown> {
  const raw = await request.text();
  if (raw.trim().length === 0) {
    throw new InvalidRequestError('Request body is required');
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  return body;
}

function requireText(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidRequestError(`${field} is required and must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(body: Record<string, unknown>, field: string): boolean {
  const value = body[field];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new InvalidRequestError(`${field} must be a boolean`);
  }
  return value;
}

function optionalTopK(body: Record<string, unknown>): number | undefined {
  const value = body.topK;
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_TOP_K) {
    throw new InvalidRequestError(`topK must be an integer between 1 and ${MAX_TOP_K}`);
  }
  return value;
}

function parseMessage(value: unknown, index: number): ChatMessage {
  if (!isRecord(value)) {
    throw new InvalidRequestError(`messages[${index}] must be an object`);
  }

  const { role, content } = value;
  if (role !== 'system' && role !== 'user' && role !== 'assistant') {
    throw new InvalidRequestError(`messages[${index}].role must be system, user or assistant`);
  }
  if (typeof content !== 'string') {
    throw new InvalidRequestError(`messages[${index}].content must be a string`);
  }

  return { role, content };
}

function parseMessages(value: unknown, field: string, required: boolean): ChatMessage[] {
  if (value === undefined && !required) return [];
  if (!Array.isArray(value)) {
    throw new InvalidRequestError(`${field} must be an array`);
  }
  return value.map((message, i) => parseMessage(message, i));
}

export function parseGenerateRequest(body: unknown): GenerateRequest {
  const obj = requireObject(body);
  return {
    prompt: requireText(obj, 'prompt'),
    stream: optionalBoolean(obj, 'stream'),
  };
}

export function parseSimpleChatRequest(body: unknown): SimpleChatRequest {
  const obj = requireObject(body);
  const messages = parseMessages(obj.messages, 'messages', true);

  if (!messages.some((message) => message.role === 'user' && message.content.trim().length > 0)) {
    throw new InvalidRequestError('messages must contain at least one non-empty user message');
  }

  return { messages, stream: optionalBoolean(obj, 'stream') };
}

export function parseRagChatRequest(body: unknown): RagChatRequest {
  const obj = requireObject(body);
  return {
    message: requireText(obj, 'message'),
    conversationHistory: parseMessages(obj.conversationHistory, 'conversationHistory', false),
    topK: optionalTopK(obj),
    stream: optionalBoolean(obj, 'stream'),
  };
}

export function parseSearchRequest(body: unknown): SearchRequest {
  const obj = requireObject(body);
  return {
    query: requireText(obj, 'query'),
    topK: optionalTopK(obj),
  };
}
