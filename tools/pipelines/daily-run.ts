/**
 * Daily Run Pipeline
 *
 * One experiment cycle per invocation; meant to be triggered once a day by a
 * scheduler (cron, or daemon.ts).
 *
 * Usage:
 *   npx tsx tools/pipelines/daily-run.ts                 # Run today's cycle
 *   npx tsx tools/pipelines/daily-run.ts --report        # Print accuracy so far (read-only)
 *   npx tsx tools/pipelines/daily-run.ts --report --write  # ...and rebuild summary.csv
 *   npx tsx tools/pipelines/daily-run.ts --status        # State, status and today's decision
 *   npx tsx tools/pipelines/daily-run.ts --check-model   # Which model actually answers
 *   npx tsx tools/pipelines/daily-run.ts --list-models   # Models available to the account
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, requireModelCredential, type AppConfig } from '../../lib/config.js';
import { createResultStore, createRunContext, stateFilePath } from '../../lib/context.js';
import { DailyRunner } from '../../lib/runner.js';
import { ExperimentStateStore, decideAction, deriveStatus, initialState } from '../../lib/experiment.js';
import { formatSummaryLines, summarize } from '../../lib/aggregator.js';
import { PROMPT_VARIANTS, variantLabel } from '../../lib/prompts.js';
import { checkModel, listModels } from '../../lib/predictor.js';
import { isMarketDay, nyCalendarDay } from '../../lib/calendar.js';
import { errorMessage } from '../../lib/errors.js';
import { logger } from '../../src/utils/logger.js';
import type { RunOutcome } from '../../src/types/index.js';

const COMPONENT = 'DailyRun';

export type Command = 'run' | 'report' | 'status' | 'check-model' | 'list-models';

export interface CliOptions {
  command: Command;
  write: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const flags = new Set(args);
  const command: Command = flags.has('--report')
    ? 'report'
    : flags.has('--status')
      ? 'status'
      : flags.has('--check-model')
        ? 'check-model'
        : flags.has('--list-models')
          ? 'list-models'
          : 'run';
  return { command, write: flags.has('--write') };
}

function printReport(config: AppConfig, write: boolean): Record<string, unknown> {
  const store = createResultStore(config);
  const records = store.readAll();
  if (records.length === 0) {
    console.log('No data collected yet.');
    return { records: 0 };
  }

  const summary = summarize(records, PROMPT_VARIANTS.map((v) => v.name));
  console.log('\n' + '='.repeat(60));
  console.log('RESULTS SO FAR');
  console.log('='.repeat(60));
  for (const line of formatSummaryLines(summary)) console.log(line);

  if (write) {
    store.rebuildSummary(summary, PROMPT_VARIANTS.map(variantLabel));
    console.log(`\nSummary written to ${store.summaryFile}`);
  }
  return { records: records.length, summary };
}

function printStatus(config: AppConfig): Record<string, unknown> {
  const today = nyCalendarDay();
  const stored = new ExperimentStateStore(stateFilePath(config)).load();
  const state = stored ?? initialState(config.experiment);
  const records = createResultStore(config).count();
  const decision = decideAction(today, state, records, isMarketDay);

  const status = {
    today,
    status: deriveStatus(stored, today),
    state,
    records,
    decision,
    variants: PROMPT_VARIANTS.map((v, i) => ({ label: variantLabel(v, i), description: v.description })),
  };
  console.log(JSON.stringify(status, null, 2));
  return status;
}

async function runModelCheck(config: AppConfig): Promise<Record<string, unknown>> {
  requireModelCredential(config);
  logger.info(COMPONENT, `Configured model: ${config.model}`);
  const result = await checkModel(config.model, config.predictionTimeoutMs);
  if (result.matches) {
    logger.info(COMPONENT, `Confirmed: API answered with ${result.actual}`);
  } else {
    logger.warn(COMPONENT, `Requested ${result.requested}, API answered with ${result.actual ?? 'unknown model'}`);
  }
  return { ...result };
}

async function runListModels(config: AppConfig): Promise<Record<string, unknown>> {
  requireModelCredential(config);
  const listing = await listModels(config.model, config.predictionTimeoutMs);

  logger.info(COMPONENT, `Available models (${listing.models.length}):`);
  for (const m of listing.models) {
    logger.info(COMPONENT, `  - ${m.value} (${m.displayName})${m.configured ? '  <- configured' : ''}`);
  }
  if (!listing.available) {
    logger.warn(COMPONENT, `Configured model ${config.model} is not in the list`);
  }
  return { ...listing };
}

async function runDaily(config: AppConfig): Promise<RunOutcome> {
  requireModelCredential(config);
  const ctx = createRunContext(config);

  // First invocation: confirm the model before any state exists
  if (!ctx.stateStore.exists()) {
    try {
      await runModelCheck(config);
    } catch (error) {
      logger.warn(COMPONENT, `Model check failed: ${errorMessage(error)}`);
    }
  }

  return new DailyRunner(ctx).runOnce();
}

export async function main(args: string[]): Promise<number> {
  try {
    const options = parseArgs(args);
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    logger.setLogDir(path.join(config.stateDir, 'logs'));

    let result: unknown;
    switch (options.command) {
      case 'report':
        result = printReport(config, options.write);
        break;
      case 'status':
        result = printStatus(config);
        break;
      case 'check-model':
        result = await runModelCheck(config);
        break;
      case 'list-models':
        result = await runListModels(config);
        break;
      case 'run':
        result = await runDaily(config);
        break;
    }

    console.log(JSON.stringify({ success: true, command: options.command, result }));
    return 0;
  } catch (error) {
    logger.error(COMPONENT, 'Invocation failed', errorMessage(error));
    console.log(JSON.stringify({ success: false, error: errorMessage(error) }));
    return 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
