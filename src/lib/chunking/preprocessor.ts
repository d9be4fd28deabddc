/**
 * Text normalization for ingested documents
 *
 * Handles:
 * - Byte order marks left by some editors
 * - Windows (CRLF) and classic Mac (CR) line endings
 * - Trailing whitespace at the end of the document
 *
 * Chunk offsets refer to the normalized text, so normalization never changes
 * anything inside the document body beyond line endings.
 */

import * as logger from '../utils/logger';

/** Minimum trimmed length for a document to be worth embedding */
export const MIN_CONTENT_LENGTH = 10;

/**
 * Normalizes raw document text before chunking
 *
 * @param content - Raw document text
 * @returns Normalized text
 */
export function normalizeContent(content: string): string {
  if (!content) {
    return '';
  }

  let processed = content;

  if (processed.charCodeAt(0) === 0xfeff) {
    processed = processed.slice(1);
  }

  processed = processed.replace(/\r\n?/g, '\n');
  processed = processed.replace(/\s+$/, '');

  if (processed.length !== content.length) {
    logger.debug('Content normalized', {
      originalLength: content.length,
      processedLength: processed.length,
    });
  }

  return processed;
}

/**
 * Validates that content is suitable for embedding generation
 *
 * @returns true if valid, false otherwise
 */
export function isValidContent(content: string): boolean {
  if (!content) {
    return false;
  }

  const trimmed = content.trim();

  if (trimmed.length < MIN_CONTENT_LENGTH) {
    logger.warn('Content too short for embedding', { length: trimmed.length });
    return false;
  }

  const nonWhitespaceRatio = trimmed.replace(/\s/g, '').length / trimmed.length;
  if (nonWhitespaceRatio < 0.3) {
    logger.warn('Content is mostly whitespace', { ratio: nonWhitespaceRatio });
    return false;
  }

  return true;
}

/**
 * Extracts a preview of the content for logging and source excerpts
 *
 * @param maxLength - Maximum preview length (default: 100)
 */
export function getContentPreview(content: string, maxLength = 100): string {
  if (!content) {
    return '[empty]';
  }

  const trimmed = content.trim();
  const preview = trimmed.substring(0, maxLength);
  return preview.length < trimmed.length ? `${preview}...` : preview;
}
