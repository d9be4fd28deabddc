/**
 * A text document discovered in the documents directory
 */
export interface SourceDocument {
  /** Path relative to the documents directory, always `/`-separated */
  id: string;

  /** Absolute path on disk */
  path: string;

  /** Lower-case extension including the dot, e.g. '.md' */
  extension: string;

  /** Normalized text content */
  content: string;

  sizeBytes: number;

  /** ISO timestamp of the file's last modification */
  modifiedAt: string;
}

/**
 * File extensions the loader knows how to read
 */
export const SUPPORTED_EXTENSIONS = ['.md', '.txt', '.pdf'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];
