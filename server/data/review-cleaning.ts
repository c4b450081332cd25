/**
 * Review corpus cleaning for ingestion.
 *
 * Input records use the flat column names of the product review export
 * ("reviews.rating", "reviews.date", ...). Each record becomes one row per
 * valid category; records without a usable rating, date, product id or
 * category are dropped.
 */

import { z } from 'zod';
import type { InsertReview } from '@shared/schema';

export const CATEGORY_BLOCKLIST: ReadonlySet<string> = new Set([
  'buy a kindle',
  'amazon.co.uk',
  'mazon.co.uk',
]);

export function isValidCategory(raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (!value || CATEGORY_BLOCKLIST.has(value)) return false;
  if (value.length < 3) return false;
  if (!/[a-z]/.test(value)) return false;
  // bare domains
  if (value.includes('.') && !value.includes(' ')) return false;
  return true;
}

/**
 * Comma-separated category string to the distinct valid names, in order
 */
export function extractCategories(raw: string | null | undefined): string[] {
  if (!raw) return [];
  const result: string[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (isValidCategory(name) && !result.includes(name)) {
      result.push(name);
    }
  }
  return result;
}

export function normalizeRating(value: unknown): number | null {
  const numeric = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isFinite(numeric) || numeric < 1 || numeric > 5) {
    return null;
  }
  return Math.round(numeric);
}

export function normalizeDate(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

const optionalText = z.union([z.string(), z.number(), z.null()]).optional();

export const rawReviewRecordSchema = z.object({
  'id': z.union([z.string(), z.number()]),
  'name': optionalText,
  'categories': optionalText,
  'reviews.rating': z.unknown().optional(),
  'reviews.date': z.unknown().optional(),
  'reviews.text': optionalText,
  'reviews.title': optionalText,
});

export interface CleaningReport {
  rows: InsertReview[];
  categories: string[];
  inputRecords: number;
  droppedRecords: number;
}

function text(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = String(value).trim();
  return trimmed === '' ? null : trimmed;
}

export function cleanReviewRecords(records: unknown[]): CleaningReport {
  const rows: InsertReview[] = [];
  const categories = new Set<string>();
  let dropped = 0;

  for (const record of records) {
    const parsed = rawReviewRecordSchema.safeParse(record);
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const data = parsed.data;
    const productId = String(data.id).trim();
    const rating = normalizeRating(data['reviews.rating']);
    const reviewDate = normalizeDate(data['reviews.date']);
    const names = extractCategories(text(data.categories));

    if (!productId || rating === null || reviewDate === null || names.length === 0) {
      dropped++;
      continue;
    }

    for (const category of names) {
      categories.add(category);
      rows.push({
        productId,
        productName: text(data.name),
        category,
        rating,
        reviewDate,
        reviewText: text(data['reviews.text']),
        reviewTitle: text(data['reviews.title']),
      });
    }
  }

  return {
    rows,
    categories: Array.from(categories).sort(),
    inputRecords: records.length,
    droppedRecords: dropped,
  };
}
