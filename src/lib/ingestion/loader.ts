/**
 * Document discovery and loading
 *
 * Markdown and plain-text files are read as UTF-8; PDFs go through pdf-parse.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SourceDocument, SUPPORTED_EXTENSIONS, SupportedExtension } from '../../types/document';
import { normalizeContent } from '../chunking/preprocessor';
import { DocumentError, toError } from '../utils/errors';
import * as logger from '../utils/logger';

export interface DiscoveredDocument {
  /** Path relative to the documents directory, `/`-separated */
  id: string;
  path: string;
  extension: SupportedExtension;
}

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

function toDocumentId(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

/**
 * Finds every supported file below a directory
 *
 * @returns Documents sorted by relative path
 * @throws DocumentError if the directory does not exist
 */
export async function discoverDocuments(sourceDirectory: string): Promise<DiscoveredDocument[]> {
  const root = path.resolve(sourceDirectory);

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(root);
  } catch (err) {
    throw new DocumentError(`Documents directory ${root} does not exist`, root, toError(err));
  }
  if (!stats.isDirectory()) {
    throw new DocumentError(`${root} is not a directory`, root);
  }

  const found: DiscoveredDocument[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined) {
      break;
    }

    const entries = await fs.promises.readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        pending.push(entryPath);
        continue;
      }

      const extension = path.extname(entry.name).toLowerCase();
      if (entry.isFile() && isSupportedExtension(extension)) {
        found.push({ id: toDocumentId(root, entryPath), path: entryPath, extension });
      }
    }
  }

  found.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  logger.debug('Documents discovered', { root, count: found.length });

  return found;
}

async function extractPdfText(buffer: Buffer): Promise<string> {
  // loaded lazily so text-only deployments never touch the PDF stack
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(buffer);
  return result.text || '';
}

/**
 * Reads and normalizes a discovered document
 *
 * @throws DocumentError if the file cannot be read or parsed
 */
export async function loadDocument(document: DiscoveredDocument): Promise<SourceDocument> {
  try {
    const [buffer, stats] = await Promise.all([
      fs.promises.readFile(document.path),
      fs.promises.stat(document.path),
    ]);

    const raw =
      document.extension === '.pdf' ? await extractPdfText(buffer) : buffer.toString('utf-8');

    return {
      id: document.id,
      path: document.path,
      extension: document.extension,
      content: normalizeContent(raw),
      sizeBytes: stats.size,
      modifiedAt: stats.mtime.toISOString(),
    };
  } catch (err) {
    throw new DocumentError(`Failed to load document ${document.id}`, document.path, toError(err));
  }
}
