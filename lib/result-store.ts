/**
 * Result Store
 *
 * Append-only table of PredictionRecords keyed by (date, ticker), plus a
 * Summary view rebuilt from scratch whenever it is requested. The runner only
 * sees the ResultStore interface; CsvResultStore is the file-backed table.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { DuplicateRecordError, StateFileError } from './errors.js';
import { formatAccuracy } from './aggregator.js';
import type { Direction, PredictionLabel, PredictionRecord, Summary } from '../src/types/index.js';

export interface ResultStore {
  readAll(): PredictionRecord[];
  count(): number;
  has(date: string, ticker: string): boolean;
  /** Throws DuplicateRecordError if (date, ticker) is already present. */
  append(record: PredictionRecord): void;
  rebuildSummary(summary: Summary, variantNames: string[]): void;
  /** Files worth attaching to notifications, existing ones only. */
  attachments(): string[];
}

const CHECK = '✓';
const CROSS = '✗';

const DIRECTIONS: Direction[] = ['UP', 'DOWN', 'NEUTRAL'];
const LABELS: PredictionLabel[] = [...DIRECTIONS, 'INVALID', 'ERROR'];

const RowsSchema = z.array(z.array(z.string()));

export function recordHeader(variantCount: number): string[] {
  const prompts = Array.from({ length: variantCount }, (_, i) => `Prompt ${i + 1}`);
  const checks = Array.from({ length: variantCount }, (_, i) => `P${i + 1} ${CHECK}`);
  return ['Day #', 'Date', 'Ticker', 'Open', 'Close', ...prompts, 'Actual', ...checks];
}

export function recordKey(date: string, ticker: string): string {
  return `${date}|${ticker}`;
}

function toRow(record: PredictionRecord): string[] {
  return [
    String(record.dayNumber),
    record.date,
    record.ticker,
    record.open.toFixed(2),
    record.close.toFixed(2),
    ...record.predicted,
    record.actual,
    ...record.correct.map((c) => (c ? CHECK : CROSS)),
  ];
}

export class CsvResultStore implements ResultStore {
  readonly recordsFile: string;
  readonly summaryFile: string;

  constructor(
    dir: string,
    private readonly variantCount: number
  ) {
    this.recordsFile = path.join(dir, 'predictions.csv');
    this.summaryFile = path.join(dir, 'summary.csv');
  }

  private rowError(row: number, message: string): StateFileError {
    return new StateFileError(this.recordsFile, `row ${row}: ${message}`);
  }

  private parseLabel<T extends string>(value: string, allowed: T[], row: number): T {
    const label = allowed.find((a) => a === value);
    if (!label) throw this.rowError(row, `unknown label "${value}"`);
    return label;
  }

  private fromRow(cells: string[], row: number): PredictionRecord {
    const n = this.variantCount;
    if (cells.length !== 6 + 2 * n) {
      throw this.rowError(row, `expected ${6 + 2 * n} columns, found ${cells.length}`);
    }

    const [day, date, ticker, open, close] = cells;
    const dayNumber = Number(day);
    if (!Number.isInteger(dayNumber) || dayNumber < 1) throw this.rowError(row, `bad day number "${day}"`);

    return {
      dayNumber,
      date,
      ticker,
      open: Number(open),
      close: Number(close),
      predicted: cells.slice(5, 5 + n).map((v) => this.parseLabel(v, LABELS, row)),
      actual: this.parseLabel(cells[5 + n], DIRECTIONS, row),
      correct: cells.slice(6 + n).map((v) => v === CHECK),
    };
  }

  readAll(): PredictionRecord[] {
    if (!fs.existsSync(this.recordsFile)) return [];

    const rows = RowsSchema.parse(parse(fs.readFileSync(this.recordsFile, 'utf-8'), { skip_empty_lines: true }));
    const [header, ...body] = rows;
    if (!header) return [];

    const expected = recordHeader(this.variantCount);
    if (header.join(',') !== expected.join(',')) {
      throw new StateFileError(this.recordsFile, `unexpected header: ${header.join(', ')}`);
    }
    return body.map((cells, i) => this.fromRow(cells, i + 2));
  }

  count(): number {
    return this.readAll().length;
  }

  has(date: string, ticker: string): boolean {
    const key = recordKey(date, ticker);
    return this.readAll().some((r) => recordKey(r.date, r.ticker) === key);
  }

  append(record: PredictionRecord): void {
    if (record.predicted.length !== this.variantCount || record.correct.length !== this.variantCount) {
      throw new Error(`Record for ${record.ticker} has ${record.predicted.length} predictions, expected ${this.variantCount}`);
    }
    if (this.has(record.date, record.ticker)) {
      throw new DuplicateRecordError(record.date, record.ticker);
    }

    fs.mkdirSync(path.dirname(this.recordsFile), { recursive: true });
    if (!fs.existsSync(this.recordsFile)) {
      fs.writeFileSync(this.recordsFile, stringify([recordHeader(this.variantCount)]));
    }
    fs.appendFileSync(this.recordsFile, stringify([toRow(record)]));
  }

  rebuildSummary(summary: Summary, variantNames: string[]): void {
    fs.mkdirSync(path.dirname(this.summaryFile), { recursive: true });
    fs.writeFileSync(this.summaryFile, stringify(summaryRows(summary, variantNames)));
  }

  attachments(): string[] {
    return [this.recordsFile, this.summaryFile].filter((f) => fs.existsSync(f));
  }
}

/**
 * The Summary view as rows: experiment details, per-prompt accuracy,
 * then per-ticker accuracy.
 */
export function summaryRows(summary: Summary, variantNames: string[]): string[][] {
  const rows: string[][] = [
    ['STOCK PREDICTION EXPERIMENT - FINAL RESULTS'],
    [],
    ['Experiment Period', `${summary.periodStart} to ${summary.periodEnd}`],
    ['Total Predictions', String(summary.totalPredictions)],
    ['Trading Days', String(summary.tradingDays)],
    [],
    ['Prompt Type', 'Correct', 'Total', 'Accuracy %'],
  ];

  for (const v of summary.byVariant) {
    rows.push([variantNames[v.variant - 1] ?? `Prompt ${v.variant}`, String(v.correct), String(v.total), formatAccuracy(v.accuracy)]);
  }

  rows.push([], ['PER-TICKER ACCURACY']);
  rows.push(['Ticker', ...summary.byVariant.map((v) => `P${v.variant} Accuracy`)]);
  for (const t of summary.byTicker) {
    rows.push([t.ticker, ...t.accuracy.map(formatAccuracy)]);
  }

  return rows;
}
