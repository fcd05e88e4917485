/**
 * Aggregation
 *
 * Read-only projections over the full record set. Owns no state.
 */

import Decimal from 'decimal.js';
import { EmptyDatasetError } from './errors.js';
import type { PredictionRecord, Summary, TickerAccuracy, VariantAccuracy } from '../src/types/index.js';

/**
 * correct / total as a percentage rounded to 2 decimals (half up).
 */
export function accuracyPercent(correct: number, total: number): number {
  if (total <= 0) throw new EmptyDatasetError();
  return new Decimal(correct).times(100).div(total).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export function formatAccuracy(accuracy: number): string {
  return `${accuracy.toFixed(2)}%`;
}

function countCorrect(records: PredictionRecord[], variantIndex: number): number {
  return records.filter((r) => r.correct[variantIndex]).length;
}

export function summarize(records: PredictionRecord[], variantNames: string[]): Summary {
  if (records.length === 0) {
    throw new EmptyDatasetError();
  }

  const total = records.length;
  const byVariant: VariantAccuracy[] = variantNames.map((name, i) => {
    const correct = countCorrect(records, i);
    return { variant: i + 1, name, correct, total, accuracy: accuracyPercent(correct, total) };
  });

  // first-appearance order follows the configured ticker order of day 1
  const tickers = [...new Set(records.map((r) => r.ticker))];
  const byTicker: TickerAccuracy[] = tickers.map((ticker) => {
    const subset = records.filter((r) => r.ticker === ticker);
    return {
      ticker,
      total: subset.length,
      accuracy: variantNames.map((_, i) => accuracyPercent(countCorrect(subset, i), subset.length)),
    };
  });

  const dates = records.map((r) => r.date).sort();

  return {
    totalPredictions: total,
    tradingDays: new Set(records.map((r) => r.dayNumber)).size,
    periodStart: dates[0],
    periodEnd: dates[dates.length - 1],
    byVariant,
    byTicker,
  };
}

/**
 * Console/notification lines, e.g. "Prompt 1 (Basic): 6/10 = 60.00%".
 */
export function formatSummaryLines(summary: Summary): string[] {
  const lines = [
    `Period: ${summary.periodStart} to ${summary.periodEnd}`,
    `Predictions: ${summary.totalPredictions} | Days: ${summary.tradingDays}`,
  ];
  for (const v of summary.byVariant) {
    lines.push(`Prompt ${v.variant} (${v.name}): ${v.correct}/${v.total} = ${formatAccuracy(v.accuracy)}`);
  }
  return lines;
}
