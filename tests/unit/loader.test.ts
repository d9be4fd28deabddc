/**
 * Unit tests for document discovery and loading
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { discoverDocuments, loadDocument } from '../../src/lib/ingestion/loader';
import { DocumentError } from '../../src/lib/utils/errors';

describe('document loader', () => {
  let root: string;

  beforeEach(async () => {
    jest.spyOn(console, 'debug').mockImplementation();
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rag-docs-'));

    await fs.promises.mkdir(path.join(root, 'notes', 'deep'), { recursive: true });
    await fs.promises.writeFile(path.join(root, 'readme.md'), '# Readme\r\nWelcome.\r\n');
    await fs.promises.writeFile(path.join(root, 'notes', 'b.txt'), 'plain text');
    await fs.promises.writeFile(path.join(root, 'notes', 'deep', 'a.TXT'), 'upper-case extension');
    await fs.promises.writeFile(path.join(root, 'notes', 'data.json'), '{}');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('discoverDocuments', () => {
    it('should find supported files recursively, sorted by relative path', async () => {
      const found = await discoverDocuments(root);

      expect(found.map((d) => d.id)).toEqual(['notes/b.txt', 'notes/deep/a.TXT', 'readme.md']);
      expect(found.map((d) => d.extension)).toEqual(['.txt', '.txt', '.md']);
      expect(found[2].path).toBe(path.join(root, 'readme.md'));
    });

    it('should return nothing for an empty directory', async () => {
      const empty = path.join(root, 'empty');
      await fs.promises.mkdir(empty);
      await expect(discoverDocuments(empty)).resolves.toEqual([]);
    });

    it('should reject a missing directory', async () => {
      await expect(discoverDocuments(path.join(root, 'missing'))).rejects.toBeInstanceOf(
        DocumentError
      );
    });

    it('should reject a file path', async () => {
      await expect(discoverDocuments(path.join(root, 'readme.md'))).rejects.toThrow(
        'is not a directory'
      );
    });
  });

  describe('loadDocument', () => {
    it('should read and normalize text documents', async () => {
      const [, , readme] = await discoverDocuments(root);
      const document = await loadDocument(readme);

      expect(document).toMatchObject({
        id: 'readme.md',
        extension: '.md',
        content: '# Readme\nWelcome.',
        sizeBytes: 20,
      });
      expect(Number.isNaN(Date.parse(document.modifiedAt))).toBe(false);
    });

    it('should wrap unparseable PDFs in DocumentError', async () => {
      const pdfPath = path.join(root, 'broken.pdf');
      await fs.promises.writeFile(pdfPath, 'this is not a pdf');

      await expect(
        loadDocument({ id: 'broken.pdf', path: pdfPath, extension: '.pdf' })
      ).rejects.toBeInstanceOf(DocumentError);
    });

    it('should wrap unreadable files in DocumentError', async () => {
      await expect(
        loadDocument({ id: 'gone.md', path: path.join(root, 'gone.md'), extension: '.md' })
      ).rejects.toMatchObject({ name: 'DocumentError', path: path.join(root, 'gone.md') });
    });
  });
});
