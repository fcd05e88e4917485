/**
 * Daily Runner
 *
 * One invocation of the experiment: read state, decide, act, persist.
 * Per-ticker and per-variant failures are recorded as data; only
 * configuration, state-file and result-table errors escape runOnce().
 *
 * run_count advances only after the whole ticker loop, so a crash mid-loop
 * re-runs the day; tickers already in the result table are skipped then.
 */

import { actualLabel, describePolicy, isCorrect, normalizePrediction } from './scorer.js';
import { applyTransition, decideAction } from './experiment.js';
import { formatSummaryLines, summarize } from './aggregator.js';
import { systemInstruction, variantLabel } from './prompts.js';
import { EmptyDatasetError, errorMessage } from './errors.js';
import { logger } from '../src/utils/logger.js';
import type { RunContext } from './context.js';
import type { Alert } from '../tools/alerts/telegram-alerts.js';
import type {
  ExperimentState,
  PredictionLabel,
  PredictionRecord,
  PriceObservation,
  RunOutcome,
  Summary,
  TickerSkip,
} from '../src/types/index.js';

const COMPONENT = 'DailyRunner';

export class DailyRunner {
  constructor(private readonly ctx: RunContext) {}

  async runOnce(today: string = this.ctx.today()): Promise<RunOutcome> {
    const { state, created } = this.ctx.stateStore.loadOrInitialize(this.ctx.experiment);
    if (created) {
      logger.info(COMPONENT, `Initialized experiment state at ${this.ctx.stateStore.path}`, state);
    }

    const recordCount = this.ctx.resultStore.count();
    const action = decideAction(today, state, recordCount, this.ctx.isMarketDay);

    if (today === state.finalReportDate && recordCount === 0 && !state.finalReportGenerated) {
      logger.error(COMPONENT, 'No data collected. Cannot generate final report.');
    }

    switch (action.kind) {
      case 'FINALIZE':
        return this.finalize(state, today);
      case 'RUN':
        return this.runDay(state, today, action.dayNumber);
      case 'SKIP_COMPLETE':
        logger.info(COMPONENT, `Experiment complete (${action.reason}). Nothing to do.`);
        return { action: action.kind, date: today, reason: action.reason };
      case 'SKIP_BEFORE_START':
        logger.info(COMPONENT, `Experiment starts on ${action.startDate}. Skipping.`);
        return { action: action.kind, date: today, reason: `starts on ${action.startDate}` };
      case 'SKIP_ALREADY_RAN':
        logger.info(COMPONENT, `Already ran on ${today}. Skipping.`);
        return { action: action.kind, date: today, reason: 'already ran today' };
      case 'SKIP_NON_MARKET_DAY':
        logger.info(COMPONENT, `Market closed on ${today}. Skipping.`);
        return { action: action.kind, date: today, reason: 'market closed' };
    }
  }

  private async runDay(state: ExperimentState, today: string, dayNumber: number): Promise<RunOutcome> {
    const { tickers, labelPolicy, resultStore } = this.ctx;

    logger.info(COMPONENT, `DAY ${dayNumber} of ${state.maxRuns} (${today})`);
    logger.info(COMPONENT, `Scoring with ${describePolicy(labelPolicy)}`);

    const records: PredictionRecord[] = [];
    const skipped: TickerSkip[] = [];

    for (const ticker of tickers) {
      if (resultStore.has(today, ticker)) {
        logger.warn(COMPONENT, `${ticker}: already recorded for ${today}, skipping`);
        skipped.push({ ticker, reason: 'already-recorded' });
        continue;
      }

      const record = await this.processTicker(ticker, today, dayNumber);
      if ('skip' in record) {
        skipped.push(record.skip);
        continue;
      }

      resultStore.append(record.record);
      records.push(record.record);
    }

    const transition = applyTransition(state, 'run', today);
    if (!transition.success || !transition.state) {
      throw new Error(`Run transition rejected: ${transition.error ?? 'unknown'}`);
    }
    this.ctx.stateStore.save(transition.state);

    logger.info(
      COMPONENT,
      `Day ${dayNumber} complete: ${records.length} recorded, ${skipped.length} skipped. Runs until ${state.endDate}.`
    );

    await this.notify(
      {
        type: 'daily_update',
        date: today,
        dayNumber,
        maxRuns: state.maxRuns,
        endDate: state.endDate,
        recorded: records.map((r) => r.ticker),
        skipped,
      },
      resultStore.attachments()
    );

    return { action: 'RUN', date: today, dayNumber, records, skipped };
  }

  private async processTicker(
    ticker: string,
    today: string,
    dayNumber: number
  ): Promise<{ record: PredictionRecord } | { skip: TickerSkip }> {
    const { priceSource, labelPolicy, variants } = this.ctx;

    let observation: PriceObservation;
    try {
      observation = await priceSource.fetchObservation(ticker, today);
    } catch (error) {
      logger.warn(COMPONENT, `${ticker}: skipped, ${errorMessage(error)}`);
      return { skip: { ticker, reason: 'fetch-failed', detail: errorMessage(error) } };
    }

    logger.info(
      COMPONENT,
      `${ticker}: open $${observation.todayOpen}, close $${observation.todayClose}, previous close $${observation.yesterdayClose}`
    );

    const actual = actualLabel(observation.todayOpen, observation.yesterdayClose, labelPolicy);
    logger.info(COMPONENT, `${ticker}: actual ${actual}`);

    const system = systemInstruction(labelPolicy.scheme);
    const predicted: PredictionLabel[] = [];

    for (const [index, variant] of variants.entries()) {
      if (index > 0 && this.ctx.predictionDelayMs > 0) {
        await this.ctx.sleep(this.ctx.predictionDelayMs);
      }
      const label = await this.predict(variant.build(observation, labelPolicy.scheme), system, ticker);
      predicted.push(label);
      logger.info(COMPONENT, `${ticker}: ${variantLabel(variant, index)} → ${label}`);
    }

    return {
      record: {
        dayNumber,
        date: today,
        ticker,
        open: observation.todayOpen,
        close: observation.todayClose,
        predicted,
        actual,
        correct: predicted.map((p) => isCorrect(p, actual)),
      },
    };
  }

  private async predict(prompt: string, system: string, ticker: string): Promise<PredictionLabel> {
    let raw: string;
    try {
      raw = await this.ctx.predictor.predict(prompt, system);
    } catch (error) {
      logger.error(COMPONENT, `${ticker}: prediction failed, recording ERROR`, errorMessage(error));
      return 'ERROR';
    }

    const label = normalizePrediction(raw, this.ctx.labelPolicy.scheme);
    if (label === 'INVALID') {
      logger.warn(COMPONENT, `${ticker}: unrecognized model output "${raw}", recording INVALID`);
    }
    return label;
  }

  private async finalize(state: ExperimentState, today: string): Promise<RunOutcome> {
    const { resultStore, variants } = this.ctx;
    logger.info(COMPONENT, 'GENERATING FINAL REPORT');

    const names = variants.map((v) => v.name);
    let summary: Summary;
    try {
      summary = summarize(resultStore.readAll(), names);
    } catch (error) {
      if (error instanceof EmptyDatasetError) {
        logger.error(COMPONENT, 'No data collected. Cannot generate final report.');
        return { action: 'FINALIZE', date: today, finalized: false, error: error.message };
      }
      throw error;
    }

    resultStore.rebuildSummary(summary, variants.map(variantLabel));

    const transition = applyTransition(state, 'finalize', today);
    if (!transition.success || !transition.state) {
      logger.error(COMPONENT, `Finalization rejected: ${transition.error ?? 'unknown'}`);
      return { action: 'FINALIZE', date: today, finalized: false, error: transition.error ?? 'rejected' };
    }
    this.ctx.stateStore.save(transition.state);

    for (const line of formatSummaryLines(summary)) {
      logger.info(COMPONENT, line);
    }
    logger.info(COMPONENT, 'Final report generated. Experiment complete!');

    await this.notify({ type: 'final_report', summary }, resultStore.attachments());

    return { action: 'FINALIZE', date: today, finalized: true, summary };
  }

  private async notify(alert: Alert, attachments: string[]): Promise<void> {
    try {
      const delivered = await this.ctx.notifier.notify(alert, attachments);
      if (!delivered) {
        logger.warn(COMPONENT, `${alert.type} notification not delivered`);
      }
    } catch (error) {
      logger.error(COMPONENT, `${alert.type} notification failed`, errorMessage(error));
    }
  }
}
