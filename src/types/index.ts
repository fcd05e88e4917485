export type Direction = "UP" | "DOWN" | "NEUTRAL";

// INVALID: the model answered but no recognized label was found.
// ERROR: the model call itself failed.
export type PredictionLabel = Direction | "INVALID" | "ERROR";

export type LabelScheme = "binary" | "ternary";

export interface LabelPolicy {
  scheme: LabelScheme;
  tieBreak: "UP" | "DOWN"; // only consulted under the binary scheme
}

export interface PriceBar {
  date: string; // YYYY-MM-DD
  open: number;
  close: number;
}

export interface PriceObservation {
  ticker: string;
  todayOpen: number;
  todayClose: number;
  yesterdayClose: number;
  recentCloses: number[]; // most recent last
  historicalCloses: number[]; // ~6 months, sampled, most recent last
}

export interface PredictionRecord {
  dayNumber: number;
  date: string;
  ticker: string;
  open: number;
  close: number;
  predicted: PredictionLabel[]; // index k-1 holds prompt variant k
  actual: Direction;
  correct: boolean[];
}

export interface ExperimentState {
  startDate: string;
  endDate: string;
  finalReportDate: string;
  runCount: number;
  maxRuns: number;
  finalReportGenerated: boolean;
  lastRunDate: string | null;
}

export type ExperimentStatus = "NOT_STARTED" | "ACTIVE" | "COMPLETE" | "FINALIZED";

export type RunAction =
  | { kind: "FINALIZE" }
  | { kind: "SKIP_COMPLETE"; reason: string }
  | { kind: "SKIP_BEFORE_START"; startDate: string }
  | { kind: "SKIP_ALREADY_RAN" }
  | { kind: "SKIP_NON_MARKET_DAY" }
  | { kind: "RUN"; dayNumber: number };

export interface VariantAccuracy {
  variant: number; // 1-based
  name: string;
  correct: number;
  total: number;
  accuracy: number; // percentage, 2 decimals
}

export interface TickerAccuracy {
  ticker: string;
  total: number;
  accuracy: number[]; // per variant, percentage, 2 decimals
}

export interface Summary {
  totalPredictions: number;
  tradingDays: number;
  periodStart: string;
  periodEnd: string;
  byVariant: VariantAccuracy[];
  byTicker: TickerAccuracy[];
}

export interface TickerSkip {
  ticker: string;
  reason: "already-recorded" | "fetch-failed";
  detail?: string;
}

export type RunOutcome =
  | {
      action: "RUN";
      date: string;
      dayNumber: number;
      records: PredictionRecord[];
      skipped: TickerSkip[];
    }
  | { action: "FINALIZE"; date: string; finalized: true; summary: Summary }
  | { action: "FINALIZE"; date: string; finalized: false; error: string }
  | {
      action: "SKIP_COMPLETE" | "SKIP_BEFORE_START" | "SKIP_ALREADY_RAN" | "SKIP_NON_MARKET_DAY";
      date: string;
      reason: string;
    };
