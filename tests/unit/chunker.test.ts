/**
 * Unit tests for text chunking
 */

import {
  chunkText,
  cleanup,
  computeChunkWindows,
  countTokens,
  reassembleChunks,
} from '../../src/lib/chunking/chunker';
import { ChunkingError } from '../../src/lib/utils/errors';

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation();
});

afterEach(() => {
  jest.restoreAllMocks();
});

afterAll(() => {
  cleanup();
});

describe('countTokens', () => {
  it('should count tokens in simple text', () => {
    expect(countTokens('Hello world')).toBe(2);
  });

  it('should return 0 for empty string', () => {
    expect(countTokens('')).toBe(0);
  });

  it('should count special-token markers as plain text', () => {
    expect(countTokens('<|endoftext|>')).toBeGreaterThan(1);
  });
});

describe('computeChunkWindows', () => {
  it('should step by size minus overlap and end at the document end', () => {
    expect(computeChunkWindows(25, 10, 3)).toEqual([
      [0, 10],
      [7, 17],
      [14, 24],
      [21, 25],
    ]);
  });

  it('should return one window when the text fits', () => {
    expect(computeChunkWindows(10, 10, 3)).toEqual([[0, 10]]);
  });

  it('should return no windows for empty text', () => {
    expect(computeChunkWindows(0, 10, 3)).toEqual([]);
  });

  it('should accept zero overlap', () => {
    expect(computeChunkWindows(20, 10, 0)).toEqual([
      [0, 10],
      [10, 20],
    ]);
  });

  it('should not cut a surrogate pair at a window end', () => {
    const content = 'abcd\uD83D\uDE00efgh';
    expect(computeChunkWindows(content.length, 5, 0, content)).toEqual([
      [0, 4],
      [4, 9],
      [9, 10],
    ]);
  });

  it('should not start an overlapping window inside a surrogate pair', () => {
    const content = 'abcd\uD83D\uDE00xyz';
    expect(computeChunkWindows(content.length, 6, 1, content)).toEqual([
      [0, 6],
      [4, 9],
    ]);
  });

  it('should reject overlap not smaller than size', () => {
    expect(() => computeChunkWindows(100, 10, 10)).toThrow(ChunkingError);
    expect(() => computeChunkWindows(100, 10, 15)).toThrow(ChunkingError);
  });

  it('should reject non-positive sizes and negative overlap', () => {
    expect(() => computeChunkWindows(100, 0, 0)).toThrow(ChunkingError);
    expect(() => computeChunkWindows(100, 10, -1)).toThrow(ChunkingError);
  });
});

describe('chunkText', () => {
  it('should return single chunk for short content', () => {
    const content = 'A short note about the garden.';
    const result = chunkText(content, { chunkSize: 1000, overlap: 200, documentId: 'notes.md' });

    expect(result.chunks).toHaveLength(1);
    expect(result.wasChunked).toBe(false);
    expect(result.chunks[0]).toMatchObject({
      id: 'notes.md#0',
      documentId: 'notes.md',
      text: content,
      startIndex: 0,
      endIndex: content.length,
      chunkIndex: 0,
      totalChunks: 1,
    });
  });

  it('should return no chunks for empty content', () => {
    const result = chunkText('');
    expect(result.chunks).toEqual([]);
    expect(result.totalTokens).toBe(0);
    expect(result.wasChunked).toBe(false);
  });

  it('should overlap consecutive chunks by the configured amount', () => {
    const content = 'abcdefghijklmnopqrstuvwxy';
    const { chunks } = chunkText(content, { chunkSize: 10, overlap: 3 });

    expect(chunks.map((c) => c.text)).toEqual(['abcdefghij', 'hijklmnopq', 'opqrstuvwx', 'vwxy']);
    expect(chunks[0].text.slice(-3)).toBe(chunks[1].text.slice(0, 3));
  });

  it('should keep emoji whole across chunk boundaries', () => {
    const content = 'abcd\uD83D\uDE00xyz';
    const { chunks } = chunkText(content, { chunkSize: 6, overlap: 1 });

    expect(chunks.map((c) => c.text)).toEqual(['abcd\uD83D\uDE00', '\uD83D\uDE00xyz']);
    expect(reassembleChunks(chunks)).toBe(content);
  });

  it('should number chunks in order', () => {
    const content = 'Sustainable gardening needs patience. '.repeat(40);
    const result = chunkText(content, { chunkSize: 200, overlap: 50, documentId: 'garden.txt' });

    expect(result.wasChunked).toBe(true);
    result.chunks.forEach((chunk, index) => {
      expect(chunk.id).toBe(`garden.txt#${index}`);
      expect(chunk.chunkIndex).toBe(index);
      expect(chunk.totalChunks).toBe(result.chunks.length);
      expect(chunk.text.length).toBeLessThanOrEqual(200);
    });
  });

  it('should default documentId to inline', () => {
    expect(chunkText('Some inline text').chunks[0].id).toBe('inline#0');
  });

  it('should cover the document exactly once after removing overlaps', () => {
    const content = 'Line one.\nLine two is longer.\nThird line!\n'.repeat(17);
    const { chunks } = chunkText(content, { chunkSize: 64, overlap: 16 });

    expect(reassembleChunks(chunks)).toBe(content);
    expect(chunks[chunks.length - 1].endIndex).toBe(content.length);
  });
});
