/**
 * Reads a product review export from disk.
 *
 * CSV (and spreadsheet) exports go through xlsx with raw text cells so dates
 * and ids keep their exported form; `.json` files hold an array of records.
 * The header is compared against the export's known column set.
 */

import fs from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { ValidationError } from '../errors/app-errors';

export const EXPECTED_COLUMNS: readonly string[] = [
  'id', 'asins', 'brand', 'categories', 'colors', 'dateAdded', 'dateUpdated', 'dimension', 'ean', 'keys',
  'manufacturer', 'manufacturerNumber', 'name', 'prices', 'reviews.date', 'reviews.doRecommend',
  'reviews.numHelpful', 'reviews.rating', 'reviews.sourceURLs', 'reviews.text', 'reviews.title',
  'reviews.userCity', 'reviews.userProvince', 'reviews.username', 'sizes', 'upc', 'weight',
];

export interface LoadedReviews {
  records: unknown[];
  columns: string[];
  missingColumns: string[];
  extraColumns: string[];
}

export function compareColumns(columns: readonly string[]): Pick<LoadedReviews, 'missingColumns' | 'extraColumns'> {
  return {
    missingColumns: EXPECTED_COLUMNS.filter((column) => !columns.includes(column)),
    extraColumns: columns.filter((column) => !EXPECTED_COLUMNS.includes(column)),
  };
}

function readSheet(filePath: string): { records: unknown[]; columns: string[] } {
  const workbook = XLSX.readFile(filePath, { raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ValidationError(`No sheet found in ${path.basename(filePath)}`);
  }

  const [header = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
  return {
    records: XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null }),
    columns: Array.from(header, (cell) => (cell === null || cell === undefined ? '' : String(cell))),
  };
}

async function readJson(filePath: string): Promise<{ records: unknown[]; columns: string[] }> {
  const content = await fs.readFile(filePath, 'utf-8');
  const records = z.array(z.unknown()).parse(JSON.parse(content));
  const columns = new Set<string>();
  for (const record of records) {
    if (typeof record === 'object' && record !== null) {
      Object.keys(record).forEach((key) => columns.add(key));
    }
  }
  return { records, columns: Array.from(columns) };
}

export async function loadReviewFile(filePath: string): Promise<LoadedReviews> {
  const resolved = path.resolve(filePath);
  const { records, columns } = path.extname(resolved).toLowerCase() === '.json'
    ? await readJson(resolved)
    : readSheet(resolved);

  return { records, columns, ...compareColumns(columns) };
}
