import { describe, it, expect } from 'vitest';
import { marketDaysFrom, nextDay, sampleRecords } from '../create-sample-report.js';

describe('sample report', () => {
  it('steps across month ends', () => {
    expect(nextDay('2026-01-31')).toBe('2026-02-01');
    expect(nextDay('2026-12-31')).toBe('2027-01-01');
  });

  it('picks market days only', () => {
    expect(marketDaysFrom('2026-01-14', 5)).toEqual([
      '2026-01-14',
      '2026-01-15',
      '2026-01-16',
      '2026-01-20', // weekend and MLK Day skipped
      '2026-01-21',
    ]);
  });

  it('builds one scored record per ticker and day', () => {
    // 0.0 picks UP, 0.9 picks DOWN
    const values = [0.0, 0.9, 0.0, 0.9, 0.5, 0.5];
    let i = 0;
    const random = () => values[i++ % values.length];

    const records = sampleRecords(['2026-01-14'], ['TSLA'], 3, 'binary', random);

    expect(records).toEqual([
      {
        dayNumber: 1,
        date: '2026-01-14',
        ticker: 'TSLA',
        open: 300,
        close: 300,
        predicted: ['UP', 'DOWN', 'UP'],
        actual: 'DOWN',
        correct: [false, true, false],
      },
    ]);
  });

  it('numbers days from one', () => {
    const records = sampleRecords(['2026-01-14', '2026-01-15'], ['TSLA', 'NVDA'], 3, 'binary', () => 0.1);
    expect(records.map((r) => `${r.dayNumber}:${r.ticker}`)).toEqual(['1:TSLA', '1:NVDA', '2:TSLA', '2:NVDA']);
  });
});
