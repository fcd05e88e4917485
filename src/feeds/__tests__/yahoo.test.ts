import { describe, it, expect, vi } from 'vitest';
import { YahooPriceFeed, buildObservation, roundPrice, toPriceBars } from '../yahoo.js';
import { FetchFailure } from '../../../lib/errors.js';
import type { PriceBar } from '../../types/index.js';

// consecutive calendar days ending on `last`
function bars(count: number, last = '2026-01-15'): PriceBar[] {
  const end = Date.parse(`${last}T00:00:00Z`);
  return Array.from({ length: count }, (_, i) => ({
    date: new Date(end - (count - 1 - i) * 86_400_000).toISOString().split('T')[0],
    open: 100 + i,
    close: 100.5 + i,
  }));
}

const DAY = '2026-01-15';

describe('yahoo price feed', () => {
  it('rounds prices to cents', () => {
    expect(roundPrice(123.456)).toBe(123.46);
    expect(roundPrice(99.994)).toBe(99.99);
    expect(roundPrice(10.005)).toBe(10.01);
  });

  it('drops quotes without open or close', () => {
    const quotes = [
      { date: new Date('2026-01-13T14:30:00Z'), open: 10, close: 11 },
      { date: new Date('2026-01-14T14:30:00Z'), open: null, close: 12 },
      { date: new Date('2026-01-15T14:30:00Z'), open: 12.5, close: 13 },
    ];
    expect(toPriceBars(quotes)).toEqual([
      { date: '2026-01-13', open: 10, close: 11 },
      { date: '2026-01-15', open: 12.5, close: 13 },
    ]);
  });

  describe('buildObservation', () => {
    it('uses the last bar as today and the one before as yesterday', () => {
      const obs = buildObservation('TSLA', bars(3), DAY);
      expect(obs.todayOpen).toBe(102);
      expect(obs.todayClose).toBe(102.5);
      expect(obs.yesterdayClose).toBe(101.5);
    });

    it('keeps the last ten closes as recent prices', () => {
      const obs = buildObservation('TSLA', bars(25), DAY);
      expect(obs.recentCloses).toHaveLength(10);
      expect(obs.recentCloses[0]).toBe(115.5);
      expect(obs.recentCloses[9]).toBe(124.5);
    });

    it('samples every fifth close when the history is long enough', () => {
      const obs = buildObservation('TSLA', bars(100), DAY);
      expect(obs.historicalCloses).toHaveLength(20);
      expect(obs.historicalCloses.slice(0, 3)).toEqual([100.5, 105.5, 110.5]);
    });

    it('keeps every close when sampling would leave too few', () => {
      const obs = buildObservation('TSLA', bars(30), DAY);
      expect(obs.historicalCloses).toHaveLength(30);
    });

    it('needs two sessions', () => {
      expect(() => buildObservation('TSLA', bars(1), DAY)).toThrow('TSLA: not enough data (1 session)');
      expect(() => buildObservation('TSLA', [], DAY)).toThrow(FetchFailure);
    });

    it("refuses an earlier session as the requested day's", () => {
      expect(() => buildObservation('TSLA', bars(2, '2026-01-14'), DAY)).toThrow(
        'TSLA: no session for 2026-01-15 yet (latest bar 2026-01-14)'
      );
    });
  });

  describe('YahooPriceFeed', () => {
    it('asks for six months of history', async () => {
      const fetchBars = vi.fn().mockResolvedValue(bars(5, '2026-07-14'));
      const feed = new YahooPriceFeed(fetchBars, () => new Date('2026-07-14T15:00:00Z'));

      const obs = await feed.fetchObservation('NVDA', '2026-07-14');

      expect(obs.ticker).toBe('NVDA');
      expect(fetchBars).toHaveBeenCalledTimes(1);
      const [ticker, since] = fetchBars.mock.calls[0];
      expect(ticker).toBe('NVDA');
      expect(since).toBeInstanceOf(Date);
      expect(since.getMonth()).toBe(new Date('2026-01-14T15:00:00Z').getMonth());
    });

    it('wraps request errors in FetchFailure', async () => {
      const feed = new YahooPriceFeed(vi.fn().mockRejectedValue(new Error('HTTP 429')));
      await expect(feed.fetchObservation('META', DAY)).rejects.toThrow('META: price request failed: HTTP 429');
    });

    it('fails when the current session has not been published yet', async () => {
      const feed = new YahooPriceFeed(
        vi.fn().mockResolvedValue(bars(2, '2026-01-14')),
        () => new Date('2026-01-15T14:30:00Z')
      );
      const pending = feed.fetchObservation('AAPL', DAY);
      await expect(pending).rejects.toBeInstanceOf(FetchFailure);
      await expect(pending).rejects.toThrow('AAPL: no session for 2026-01-15 yet (latest bar 2026-01-14)');
    });
  });
});
