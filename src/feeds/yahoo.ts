import yahooFinance from "yahoo-finance2";
import Decimal from "decimal.js";
import { logger } from "../utils/logger.js";
import { FetchFailure, errorMessage } from "../../lib/errors.js";
import { nyCalendarDay } from "../../lib/calendar.js";
import type { PriceBar, PriceObservation } from "../types/index.js";

export interface PriceSource {
  /** Observation for the session of `day` ("YYYY-MM-DD", New York). */
  fetchObservation(ticker: string, day: string): Promise<PriceObservation>;
}

interface ChartQuote {
  date: Date;
  open?: number | null;
  close?: number | null;
}

type FetchBars = (ticker: string, since: Date) => Promise<PriceBar[]>;

const HISTORY_MONTHS = 6;
const RECENT_WINDOW = 10;
const HISTORY_SAMPLE_STEP = 5; // ~weekly
const MIN_HISTORY_POINTS = 20;

export function roundPrice(value: number): number {
  return new Decimal(value).toDecimalPlaces(2).toNumber();
}

export function toPriceBars(quotes: ChartQuote[]): PriceBar[] {
  const bars: PriceBar[] = [];
  for (const q of quotes) {
    if (typeof q.open !== "number" || typeof q.close !== "number") continue;
    bars.push({ date: nyCalendarDay(q.date), open: q.open, close: q.close });
  }
  return bars;
}

/**
 * Daily bars (oldest first) → observation. The last bar must be the session of `day`;
 * the one before it gives yesterday's close.
 */
export function buildObservation(ticker: string, bars: PriceBar[], day: string): PriceObservation {
  if (bars.length < 2) {
    throw new FetchFailure(ticker, `not enough data (${bars.length} session${bars.length === 1 ? "" : "s"})`);
  }

  const today = bars[bars.length - 1];
  if (today.date !== day) {
    throw new FetchFailure(ticker, `no session for ${day} yet (latest bar ${today.date})`);
  }
  const yesterday = bars[bars.length - 2];
  const closes = bars.map((b) => roundPrice(b.close));

  let historicalCloses = closes.filter((_, i) => i % HISTORY_SAMPLE_STEP === 0);
  if (historicalCloses.length < MIN_HISTORY_POINTS) {
    historicalCloses = closes;
  }

  return {
    ticker,
    todayOpen: roundPrice(today.open),
    todayClose: roundPrice(today.close),
    yesterdayClose: roundPrice(yesterday.close),
    recentCloses: closes.slice(-RECENT_WINDOW),
    historicalCloses,
  };
}

async function fetchYahooBars(ticker: string, since: Date): Promise<PriceBar[]> {
  const chart = await yahooFinance.chart(ticker, { period1: since, interval: "1d" });
  return toPriceBars(chart.quotes);
}

export class YahooPriceFeed implements PriceSource {
  constructor(
    private readonly fetchBars: FetchBars = fetchYahooBars,
    private readonly now: () => Date = () => new Date()
  ) {}

  async fetchObservation(ticker: string, day: string): Promise<PriceObservation> {
    const since = new Date(this.now());
    since.setMonth(since.getMonth() - HISTORY_MONTHS);

    let bars: PriceBar[];
    try {
      bars = await this.fetchBars(ticker, since);
    } catch (err) {
      throw new FetchFailure(ticker, `price request failed: ${errorMessage(err)}`, { cause: err });
    }

    logger.debug("YahooPriceFeed", `${ticker}: ${bars.length} daily bars since ${since.toISOString().split("T")[0]}`);
    return buildObservation(ticker, bars, day);
  }
}
