import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CsvResultStore, recordHeader, summaryRows } from '../result-store.js';
import { summarize } from '../aggregator.js';
import { DuplicateRecordError, StateFileError } from '../errors.js';
import type { PredictionRecord } from '../../src/types/index.js';

function record(overrides: Partial<PredictionRecord> = {}): PredictionRecord {
  return {
    dayNumber: 1,
    date: '2026-01-14',
    ticker: 'TSLA',
    open: 431.5,
    close: 440.2,
    predicted: ['UP', 'DOWN', 'UP'],
    actual: 'UP',
    correct: [true, false, true],
    ...overrides,
  };
}

describe('CsvResultStore', () => {
  let dir: string;
  let store: CsvResultStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'result-store-'));
    store = new CsvResultStore(dir, 3);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('names one prediction and one check column per variant', () => {
    expect(recordHeader(3)).toEqual([
      'Day #', 'Date', 'Ticker', 'Open', 'Close',
      'Prompt 1', 'Prompt 2', 'Prompt 3', 'Actual',
      'P1 ✓', 'P2 ✓', 'P3 ✓',
    ]);
  });

  it('is empty before the first append', () => {
    expect(store.readAll()).toEqual([]);
    expect(store.count()).toBe(0);
    expect(store.attachments()).toEqual([]);
  });

  it('writes a header and one row per record', () => {
    store.append(record());
    expect(fs.readFileSync(store.recordsFile, 'utf-8')).toBe(
      'Day #,Date,Ticker,Open,Close,Prompt 1,Prompt 2,Prompt 3,Actual,P1 ✓,P2 ✓,P3 ✓\n' +
        '1,2026-01-14,TSLA,431.50,440.20,UP,DOWN,UP,UP,✓,✗,✓\n'
    );
  });

  it('reads back what it wrote', () => {
    const first = record();
    const second = record({ ticker: 'NVDA', predicted: ['ERROR', 'INVALID', 'DOWN'], actual: 'DOWN', correct: [false, false, true] });
    store.append(first);
    store.append(second);

    expect(store.readAll()).toEqual([first, second]);
    expect(store.count()).toBe(2);
    expect(store.has('2026-01-14', 'NVDA')).toBe(true);
    expect(store.has('2026-01-15', 'NVDA')).toBe(false);
  });

  it('rejects a second record for the same date and ticker', () => {
    store.append(record());
    expect(() => store.append(record({ dayNumber: 2 }))).toThrow(DuplicateRecordError);
    expect(() => store.append(record())).toThrow('A record for TSLA on 2026-01-14 already exists');
    expect(store.count()).toBe(1);
  });

  it('rejects records with the wrong number of predictions', () => {
    expect(() => store.append(record({ predicted: ['UP'], correct: [true] }))).toThrow(
      'Record for TSLA has 1 predictions, expected 3'
    );
  });

  it('rejects a table written for a different variant count', () => {
    store.append(record());
    const narrower = new CsvResultStore(dir, 2);
    expect(() => narrower.readAll()).toThrow(StateFileError);
  });

  it('reports the row of an unknown label', () => {
    fs.writeFileSync(
      store.recordsFile,
      recordHeader(3).join(',') + '\n1,2026-01-14,TSLA,1.00,2.00,UP,SIDEWAYS,UP,UP,✓,✗,✓\n'
    );
    expect(() => store.readAll()).toThrow(`${store.recordsFile}: row 2: unknown label "SIDEWAYS"`);
  });

  it('rebuilds the summary file and lists both as attachments', () => {
    store.append(record());
    store.append(record({ ticker: 'NVDA', correct: [false, false, true] }));
    const summary = summarize(store.readAll(), ['Basic', 'Price Data', 'Research']);

    store.rebuildSummary(summary, ['Prompt 1 (Basic)', 'Prompt 2 (Price Data)', 'Prompt 3 (Research)']);

    expect(store.attachments()).toEqual([store.recordsFile, store.summaryFile]);
    const lines = fs.readFileSync(store.summaryFile, 'utf-8').split('\n');
    expect(lines[0]).toBe('STOCK PREDICTION EXPERIMENT - FINAL RESULTS');
    expect(lines).toContain('Prompt 1 (Basic),1,2,50.00%');
    expect(lines).toContain('NVDA,0.00%,0.00%,100.00%');
  });
});

describe('summaryRows', () => {
  it('lays out details, prompt accuracy and per-ticker accuracy', () => {
    const summary = summarize(
      [
        record(),
        record({ date: '2026-01-15', dayNumber: 2, correct: [false, false, true] }),
      ],
      ['Basic', 'Price Data', 'Research']
    );

    expect(summaryRows(summary, ['Prompt 1 (Basic)', 'Prompt 2 (Price Data)', 'Prompt 3 (Research)'])).toEqual([
      ['STOCK PREDICTION EXPERIMENT - FINAL RESULTS'],
      [],
      ['Experiment Period', '2026-01-14 to 2026-01-15'],
      ['Total Predictions', '2'],
      ['Trading Days', '2'],
      [],
      ['Prompt Type', 'Correct', 'Total', 'Accuracy %'],
      ['Prompt 1 (Basic)', '1', '2', '50.00%'],
      ['Prompt 2 (Price Data)', '0', '2', '0.00%'],
      ['Prompt 3 (Research)', '2', '2', '100.00%'],
      [],
      ['PER-TICKER ACCURACY'],
      ['Ticker', 'P1 Accuracy', 'P2 Accuracy', 'P3 Accuracy'],
      ['TSLA', '50.00%', '0.00%', '100.00%'],
    ]);
  });
});
