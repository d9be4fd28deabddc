#!/usr/bin/env node
/**
 * Command-line ingestion
 *
 * Usage: rag-ingest [documentsPath] [vectorStorePath]
 *
 * Paths default to DOCUMENTS_PATH and VECTOR_STORE_PATH. Exits 0 after
 * publishing a new index generation, 1 on failure.
 */

import 'dotenv/config';

import { initializeSentry, flushSentry } from './lib/utils/sentry';
import { initializeTelemetry, flushTelemetry } from './lib/utils/telemetry';
import { IngestionReport, runIngestion } from './lib/ingestion/pipeline';
import { validateConfig } from './types/config';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';

export function formatReport(report: IngestionReport): string {
  const lines = [
    `Generation:         ${report.generation}`,
    `Documents found:    ${report.documentsFound}`,
    `Documents ingested: ${report.documentsIngested}`,
    `Documents skipped:  ${report.documentsSkipped.length}`,
    `Chunks created:     ${report.chunksCreated}`,
    `Index entries:      ${report.entryCount} (dimension ${report.dimension})`,
    `Duration:           ${(report.durationMs / 1000).toFixed(1)}s`,
  ];

  for (const skipped of report.documentsSkipped) {
    lines.push(`  skipped ${skipped.documentId}: ${skipped.reason}`);
  }

  return lines.join('\n');
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  initializeSentry('ingestion');
  initializeTelemetry();

  const [documentsPath, vectorStorePath] = argv;

  try {
    validateConfig();
    const report = await runIngestion({ documentsPath, vectorStorePath });
    console.log(formatReport(report));
    return 0;
  } catch (err) {
    logger.logError('Ingestion run failed', toError(err));
    return 1;
  } finally {
    await flushTelemetry();
    await flushSentry();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
