/**
 * Unit tests for document text normalization
 */

import {
  getContentPreview,
  isValidContent,
  normalizeContent,
} from '../../src/lib/chunking/preprocessor';

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation();
  jest.spyOn(console, 'warn').mockImplementation();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('normalizeContent', () => {
  it('should convert CRLF and CR line endings to LF', () => {
    expect(normalizeContent('one\r\ntwo\rthree')).toBe('one\ntwo\nthree');
  });

  it('should strip a leading byte order mark', () => {
    expect(normalizeContent('\uFEFF# Title')).toBe('# Title');
  });

  it('should strip trailing whitespace only', () => {
    expect(normalizeContent('  indented body  \n\n')).toBe('  indented body');
  });

  it('should leave clean content untouched', () => {
    const content = '# Notes\n\nAlready clean.';
    expect(normalizeContent(content)).toBe(content);
  });

  it('should return empty string for empty input', () => {
    expect(normalizeContent('')).toBe('');
  });
});

describe('isValidContent', () => {
  it('should accept ordinary text', () => {
    expect(isValidContent('This document has enough text.')).toBe(true);
  });

  it('should reject empty and short content', () => {
    expect(isValidContent('')).toBe(false);
    expect(isValidContent('   tiny   ')).toBe(false);
  });

  it('should reject content that is mostly whitespace', () => {
    expect(isValidContent(`a${' '.repeat(20)}b${' '.repeat(20)}c${' '.repeat(20)}d`)).toBe(false);
  });
});

describe('getContentPreview', () => {
  it('should truncate long content with an ellipsis', () => {
    expect(getContentPreview('abcdefghij', 4)).toBe('abcd...');
  });

  it('should return short content unchanged after trimming', () => {
    expect(getContentPreview('  short  ', 100)).toBe('short');
  });

  it('should mark empty content', () => {
    expect(getContentPreview('')).toBe('[empty]');
  });
});
