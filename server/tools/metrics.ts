/**
 * Category metrics computed from rating histograms.
 *
 * NPS = (%promoters - %detractors) * 100 with promoters rating 4-5,
 * passives 3 and detractors 1-2. Values are returned unrounded.
 */

import type { RatingHistogramRow } from '../storage';
import type {
  CategoryMetricsRow,
  MetricName,
  OrderDirection,
  RatingBucket,
  RatingDistributionData,
} from './types';

interface RatingTally {
  total: number;
  sum: number;
  promoters: number;
  detractors: number;
}

export function computeNps(tally: Pick<RatingTally, 'total' | 'promoters' | 'detractors'>): number {
  if (tally.total === 0) {
    return 0;
  }
  return ((tally.promoters / tally.total) - (tally.detractors / tally.total)) * 100;
}

function tallyByCategory(rows: RatingHistogramRow[]): Map<string, RatingTally> {
  const tallies = new Map<string, RatingTally>();
  for (const row of rows) {
    const tally = tallies.get(row.category) ?? { total: 0, sum: 0, promoters: 0, detractors: 0 };
    tally.total += row.count;
    tally.sum += row.rating * row.count;
    if (row.rating >= 4) tally.promoters += row.count;
    if (row.rating <= 2) tally.detractors += row.count;
    tallies.set(row.category, tally);
  }
  return tallies;
}

/**
 * One metrics row per category that has at least one review
 */
export function categoryMetrics(rows: RatingHistogramRow[]): CategoryMetricsRow[] {
  return Array.from(tallyByCategory(rows).entries())
    .filter(([, tally]) => tally.total > 0)
    .map(([category, tally]) => ({
      category,
      review_count: tally.total,
      avg_rating: tally.sum / tally.total,
      nps: computeNps(tally),
    }));
}

export function compareCategoryNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Metric descending for `top`, ascending for `bottom`; ties by category name
 * ascending in both directions.
 */
export function rankCategories(
  rows: CategoryMetricsRow[],
  metric: MetricName,
  order: OrderDirection,
  topN: number
): CategoryMetricsRow[] {
  const direction = order === 'top' ? -1 : 1;
  return [...rows]
    .sort((a, b) => {
      const diff = a[metric] - b[metric];
      if (diff !== 0) {
        return diff * direction;
      }
      return compareCategoryNames(a.category, b.category);
    })
    .slice(0, topN);
}

export function totals(rows: RatingHistogramRow[]): { reviewCount: number; avgRating: number; nps: number } {
  let total = 0;
  let sum = 0;
  let promoters = 0;
  let detractors = 0;
  for (const row of rows) {
    total += row.count;
    sum += row.rating * row.count;
    if (row.rating >= 4) promoters += row.count;
    if (row.rating <= 2) detractors += row.count;
  }
  return {
    reviewCount: total,
    avgRating: total === 0 ? 0 : sum / total,
    nps: computeNps({ total, promoters, detractors }),
  };
}

const BUCKETS: RatingBucket[] = ['1', '2', '3', '4', '5'];

function isBucket(value: string): value is RatingBucket {
  return BUCKETS.some((bucket) => bucket === value);
}

export function ratingDistribution(rows: RatingHistogramRow[], category: string): RatingDistributionData {
  const counts: Record<RatingBucket, number> = { '1': 0, '2': 0, '3': 0, '4': 0, '5': 0 };
  let total = 0;
  for (const row of rows) {
    const bucket = String(row.rating);
    if (row.category !== category || !isBucket(bucket)) continue;
    counts[bucket] += row.count;
    total += row.count;
  }
  return { category, counts, total };
}
