#!/usr/bin/env npx tsx
/**
 * Create a sample result table and summary from random predictions, to check
 * the report layout without waiting for a real experiment.
 *
 * Usage:
 *   npx tsx scripts/create-sample-report.ts [outputDir] [days]
 *
 * Writes predictions.csv and summary.csv into outputDir (default <STATE_DIR>/sample).
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../lib/config.js';
import { CsvResultStore } from '../lib/result-store.js';
import { formatSummaryLines, summarize } from '../lib/aggregator.js';
import { PROMPT_VARIANTS, variantLabel } from '../lib/prompts.js';
import { allowedLabels, isCorrect } from '../lib/scorer.js';
import { isMarketDay } from '../lib/calendar.js';
import { roundPrice } from '../src/feeds/yahoo.js';
import { errorMessage } from '../lib/errors.js';
import { logger } from '../src/utils/logger.js';
import type { LabelScheme, PredictionRecord } from '../src/types/index.js';

export function nextDay(day: string): string {
  const [y, m, d] = day.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d + 1)).toISOString().slice(0, 10);
}

/**
 * The first `count` market days on or after `start`.
 */
export function marketDaysFrom(start: string, count: number): string[] {
  const days: string[] = [];
  let day = start;
  while (days.length < count) {
    if (isMarketDay(day)) days.push(day);
    day = nextDay(day);
  }
  return days;
}

export function sampleRecords(
  days: string[],
  tickers: string[],
  variantCount: number,
  scheme: LabelScheme,
  random: () => number = Math.random
): PredictionRecord[] {
  const labels = allowedLabels(scheme);
  const pick = () => labels[Math.floor(random() * labels.length)];
  const price = () => roundPrice(100 + random() * 400);

  return days.flatMap((date, i) =>
    tickers.map((ticker) => {
      const predicted = Array.from({ length: variantCount }, pick);
      const actual = pick();
      return {
        dayNumber: i + 1,
        date,
        ticker,
        open: price(),
        close: price(),
        predicted,
        actual,
        correct: predicted.map((p) => isCorrect(p, actual)),
      };
    })
  );
}

function main(): void {
  const config = loadConfig();
  const outputDir = path.resolve(process.argv[2] ?? path.join(config.stateDir, 'sample'));
  const dayCount = Number(process.argv[3] ?? 13);
  if (!Number.isInteger(dayCount) || dayCount < 1) {
    throw new Error(`Day count must be a positive integer, got "${process.argv[3]}"`);
  }

  fs.rmSync(path.join(outputDir, 'predictions.csv'), { force: true });
  const store = new CsvResultStore(outputDir, PROMPT_VARIANTS.length);
  const days = marketDaysFrom(config.experiment.startDate, dayCount);
  for (const record of sampleRecords(days, config.tickers, PROMPT_VARIANTS.length, config.labelPolicy.scheme)) {
    store.append(record);
  }

  const summary = summarize(store.readAll(), PROMPT_VARIANTS.map((v) => v.name));
  store.rebuildSummary(summary, PROMPT_VARIANTS.map(variantLabel));

  for (const line of formatSummaryLines(summary)) console.log(line);
  console.log(`\n✅ Sample report created in ${outputDir}`);
  console.log(`   - ${path.basename(store.recordsFile)}: ${summary.totalPredictions} predictions`);
  console.log(`   - ${path.basename(store.summaryFile)}: overall and per-ticker accuracy`);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  try {
    main();
  } catch (error) {
    logger.error('SampleReport', 'Failed to create sample report', errorMessage(error));
    process.exitCode = 1;
  }
}
