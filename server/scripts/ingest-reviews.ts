/**
 * REVIEW INGESTION
 *
 * Usage: npx tsx server/scripts/ingest-reviews.ts <reviews.csv> --dry-run
 *        npx tsx server/scripts/ingest-reviews.ts <reviews.csv> --execute
 *
 * The input is a CSV export (or a JSON array) of flat review records ("id",
 * "name", "categories", "reviews.rating", "reviews.date", "reviews.text",
 * "reviews.title"). Each record is expanded to one row per valid category.
 */

import { storage, type IStorage } from '../storage';
import { closeDb } from '../db';
import { cleanReviewRecords, type CleaningReport } from '../data/review-cleaning';
import { loadReviewFile } from '../data/review-loader';
import { log as baseLog } from '../utils/logger';
import { getErrorMessage } from '../errors/app-errors';

const log = baseLog.child({ component: 'Ingest' });

export interface IngestSummary extends Omit<CleaningReport, 'rows'> {
  rowsPrepared: number;
  rowsInserted: number;
}

export async function ingestRecords(
  target: IStorage,
  records: unknown[],
  options: { dryRun: boolean }
): Promise<IngestSummary> {
  const report = cleanReviewRecords(records);
  const summary: IngestSummary = {
    categories: report.categories,
    inputRecords: report.inputRecords,
    droppedRecords: report.droppedRecords,
    rowsPrepared: report.rows.length,
    rowsInserted: 0,
  };

  if (options.dryRun) {
    return summary;
  }

  await target.upsertCategories(report.categories);
  summary.rowsInserted = await target.insertReviews(report.rows);
  return summary;
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith('--'));
  const execute = args.includes('--execute');

  if (!file || (!execute && !args.includes('--dry-run'))) {
    log.error('Usage: ingest-reviews.ts <reviews.csv|reviews.json> (--dry-run | --execute)');
    process.exit(1);
  }

  const loaded = await loadReviewFile(file);
  if (loaded.missingColumns.length > 0 || loaded.extraColumns.length > 0) {
    log.warn({
      missingColumns: loaded.missingColumns,
      extraColumns: loaded.extraColumns,
    }, 'Review export columns differ from the expected set');
  }

  const summary = await ingestRecords(storage, loaded.records, { dryRun: !execute });
  log.info({
    mode: execute ? 'execute' : 'dry-run',
    inputRecords: summary.inputRecords,
    droppedRecords: summary.droppedRecords,
    categories: summary.categories.length,
    rowsPrepared: summary.rowsPrepared,
    rowsInserted: summary.rowsInserted,
  }, 'Ingestion finished');

  await closeDb();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error({ err: error }, `Ingestion failed: ${getErrorMessage(error)}`);
    process.exit(1);
  });
}
