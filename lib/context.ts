/**
 * Run Context
 *
 * Everything an invocation needs, built once from AppConfig and handed to
 * the runner. Tests build their own with fakes in place of the network-backed
 * collaborators.
 */

import * as path from 'path';
import { ExperimentStateStore } from './experiment.js';
import { CsvResultStore, type ResultStore } from './result-store.js';
import { ClaudePredictor, type Predictor } from './predictor.js';
import { PROMPT_VARIANTS, type PromptVariant } from './prompts.js';
import { isMarketDay, nyCalendarDay } from './calendar.js';
import { YahooPriceFeed, type PriceSource } from '../src/feeds/yahoo.js';
import { TelegramNotifier, type Notifier } from '../tools/alerts/telegram-alerts.js';
import { resolveChatId } from '../tools/telegram/bot.js';
import type { AppConfig, ExperimentDefaults } from './config.js';
import type { LabelPolicy } from '../src/types/index.js';

export interface RunContext {
  tickers: string[];
  experiment: ExperimentDefaults;
  labelPolicy: LabelPolicy;
  variants: PromptVariant[];
  predictionDelayMs: number;
  stateStore: ExperimentStateStore;
  resultStore: ResultStore;
  priceSource: PriceSource;
  predictor: Predictor;
  notifier: Notifier;
  isMarketDay: (day: string) => boolean;
  today: () => string;
  sleep: (ms: number) => Promise<void>;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function stateFilePath(config: AppConfig): string {
  return path.join(config.stateDir, 'experiment.json');
}

export function createResultStore(config: AppConfig): CsvResultStore {
  return new CsvResultStore(config.stateDir, PROMPT_VARIANTS.length);
}

export function createRunContext(config: AppConfig): RunContext {
  const chatId = resolveChatId(config.telegram.chatId, path.join(config.stateDir, 'telegram_chat_id.txt'));
  const target = config.telegram.botToken && chatId ? { token: config.telegram.botToken, chatId } : null;

  return {
    tickers: config.tickers,
    experiment: config.experiment,
    labelPolicy: config.labelPolicy,
    variants: PROMPT_VARIANTS,
    predictionDelayMs: config.predictionDelayMs,
    stateStore: new ExperimentStateStore(stateFilePath(config)),
    resultStore: createResultStore(config),
    priceSource: new YahooPriceFeed(),
    predictor: new ClaudePredictor(config.model, config.predictionTimeoutMs),
    notifier: new TelegramNotifier(target),
    isMarketDay,
    today: () => nyCalendarDay(new Date()),
    sleep: defaultSleep,
  };
}
