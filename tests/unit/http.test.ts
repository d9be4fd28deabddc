/**
 * Unit tests for request parsing, validation and responses
 */

import { ReadableStream } from 'stream/web';
import {
  encodeEvent,
  errorResponse,
  getErrorStatus,
  sseResponse,
} from '../../src/lib/http/responses';
import {
  parseGenerateRequest,
  parseRagChatRequest,
  parseSearchRequest,
  parseSimpleChatRequest,
  readJsonBody,
} from '../../src/lib/http/validation';
import {
  GenerationError,
  IndexNotReadyError,
  IngestionInProgressError,
  InvalidRequestError,
  ServiceUnavailableError,
} from '../../src/lib/utils/errors';
import { resetSettings } from '../../src/types/config';
import { jsonRequest, rawRequest, readEvents, streamOf } from '../helpers/http';

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation();
  jest.spyOn(console, 'info').mockImplementation();
  jest.spyOn(console, 'warn').mockImplementation();
  jest.spyOn(console, 'error').mockImplementation();
  resetSettings();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('readJsonBody', () => {
  it('should parse JSON bodies', async () => {
    await expect(readJsonBody(jsonRequest('/search', { query: 'q' }))).resolves.toEqual({ query: 'q' });
  });

  it('should reject empty and malformed bodies', async () => {
    await expect(readJsonBody(rawRequest('/search', '  '))).rejects.toThrow('Request body is required');
    await expect(readJsonBody(rawRequest('/search', '{not json'))).rejects.toThrow(
      'Request body must be valid JSON'
    );
  });
});

describe('errorResponse', () => {
  it('should map errors to statuses', () => {
    expect(getErrorStatus(new InvalidRequestError('bad'))).toBe(400);
    expect(getErrorStatus(new IngestionInProgressError())).toBe(409);
    expect(getErrorStatus(new ServiceUnavailableError('down', 'ollama'))).toBe(503);
    expect(getErrorStatus(new IndexNotReadyError())).toBe(503);
    expect(getErrorStatus(new GenerationError('rejected'))).toBe(500);
    expect(getErrorStatus('not an error')).toBe(500);
  });

  it('should label unavailable services and missing indexes', () => {
    expect(errorResponse(new ServiceUnavailableError('down', 'ollama')).jsonBody).toEqual({
      error: 'Service unavailable',
      message: 'down',
    });
    expect(errorResponse(new IndexNotReadyError()).jsonBody).toEqual({
      error: 'Index not ready',
      message: 'Vector index not found. Run ingestion first.',
    });
  });
});

describe('sseResponse', () => {
  it('should frame events as data lines', () => {
    expect(encodeEvent({ type: 'content', text: 'hi' })).toBe('data: {"type":"content","text":"hi"}\n\n');
  });

  it('should emit start, content, sources and done in order', async () => {
    const onComplete = jest.fn();
    const response = sseResponse(streamOf(['Hel', 'lo']), {
      sources: [
        { id: 1, file: 'a.md', documentId: 'a.md', chunkIndex: 0, relevance: '90.0', excerpt: 'x' },
      ],
      onComplete,
    });

    expect(response.headers).toEqual({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    expect((await readEvents(response)).map((e) => e.type)).toEqual([
      'start',
      'content',
      'content',
      'sources',
      'done',
    ]);
    expect(onComplete).toHaveBeenCalledWith('Hello');
  });

  it('should end with an error event when the upstream fails mid-stream', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield 'partial';
      throw new Error('connection reset');
    }
    const onError = jest.fn();

    const events = await readEvents(sseResponse(failing(), { onError }));

    expect(events).toEqual([
      { type: 'start' },
      { type: 'content', text: 'partial' },
      { type: 'error', error: 'connection reset' },
    ]);
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it('should stop reading and report through onError when the client disconnects', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const pulled: string[] = [];
    async function* deltas(): AsyncGenerator<string> {
      pulled.push('first');
      yield 'first';
      await gate;
      pulled.push('second');
      yield 'second';
      pulled.push('third');
      yield 'third';
    }

    let reportError: (error: Error) => void = () => undefined;
    const reported = new Promise<Error>((resolve) => {
      reportError = resolve;
    });
    const onComplete = jest.fn();

    const body = sseResponse(deltas(), { onComplete, onError: (err) => reportError(err) }).body;
    if (!(body instanceof ReadableStream)) {
      throw new Error('Expected a streaming response body');
    }

    const reader = body.getReader();
    await reader.read();
    await reader.cancel();
    release();

    expect((await reported).message).toBe('Client disconnected');
    expect(pulled).toEqual(['first', 'second']);
    expect(onComplete).not.toHaveBeenCalled();
  });
});

describe('request validation', () => {
  it('should accept a generate request and default stream to false', () => {
    expect(parseGenerateRequest({ prompt: 'Hello' })).toEqual({ prompt: 'Hello', stream: false });
  });

  it('should reject blank prompts and non-object bodies', () => {
    expect(() => parseGenerateRequest({ prompt: '   ' })).toThrow(
      'prompt is required and must be a non-empty string'
    );
    expect(() => parseGenerateRequest(['prompt'])).toThrow('Request body must be a JSON object');
  });

  it('should require a user message in simple chat', () => {
    expect(() =>
      parseSimpleChatRequest({ messages: [{ role: 'system', content: 'Be brief.' }] })
    ).toThrow('messages must contain at least one non-empty user message');
  });

  it('should reject unknown roles', () => {
    expect(() =>
      parseSimpleChatRequest({ messages: [{ role: 'tool', content: 'x' }] })
    ).toThrow('messages[0].role must be system, user or assistant');
  });

  it('should default the RAG conversation history to empty', () => {
    expect(parseRagChatRequest({ message: 'What do my notes say?' })).toEqual({
      message: 'What do my notes say?',
      conversationHistory: [],
      topK: undefined,
      stream: false,
    });
  });

  it('should bound topK', () => {
    expect(parseSearchRequest({ query: 'q', topK: 3 })).toEqual({ query: 'q', topK: 3 });
    expect(() => parseSearchRequest({ query: 'q', topK: 0 })).toThrow(
      'topK must be an integer between 1 and 50'
    );
    expect(() => parseSearchRequest({ query: 'q', topK: 2.5 })).toThrow(InvalidRequestError);
  });
});
