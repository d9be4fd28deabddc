/**
 * Unit tests for the ingestion command line
 */

jest.mock('../../src/lib/ingestion/pipeline');

import { runIngestion, IngestionReport } from '../../src/lib/ingestion/pipeline';
import { formatReport, main } from '../../src/ingest';
import { DocumentError } from '../../src/lib/utils/errors';

const report: IngestionReport = {
  generation: '20260101-000000000-abc123',
  documentsFound: 3,
  documentsIngested: 2,
  documentsSkipped: [{ documentId: 'tiny.txt', reason: 'empty or too short' }],
  chunksCreated: 7,
  entryCount: 7,
  dimension: 768,
  durationMs: 2400,
};

beforeEach(() => {
  jest.resetAllMocks();
  jest.spyOn(console, 'log').mockImplementation();
  jest.spyOn(console, 'info').mockImplementation();
  jest.spyOn(console, 'warn').mockImplementation();
  jest.spyOn(console, 'error').mockImplementation();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('formatReport', () => {
  it('should summarize the run and list skipped documents', () => {
    expect(formatReport(report)).toBe(
      [
        'Generation:         20260101-000000000-abc123',
        'Documents found:    3',
        'Documents ingested: 2',
        'Documents skipped:  1',
        'Chunks created:     7',
        'Index entries:      7 (dimension 768)',
        'Duration:           2.4s',
        '  skipped tiny.txt: empty or too short',
      ].join('\n')
    );
  });
});

describe('main', () => {
  it('should pass path arguments through and exit 0', async () => {
    jest.mocked(runIngestion).mockResolvedValue(report);

    await expect(main(['/tmp/docs', '/tmp/store'])).resolves.toBe(0);
    expect(runIngestion).toHaveBeenCalledWith({
      documentsPath: '/tmp/docs',
      vectorStorePath: '/tmp/store',
    });
  });

  it('should exit 1 when ingestion fails', async () => {
    jest.mocked(runIngestion).mockRejectedValue(new DocumentError('Documents directory missing'));

    await expect(main([])).resolves.toBe(1);
  });
});
