/**
 * Experiment State Machine
 *
 * Tracks progress across once-per-day invocations.
 * Code enforces valid transitions; callers only ask "what now?" and apply.
 *
 * State machine:
 *   NOT_STARTED → ACTIVE → COMPLETE
 *                   ↓         ↓
 *                  FINALIZED ←┘
 *
 * COMPLETE is derived (run cap reached or past end date), never stored.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StateFileError } from './errors.js';
import type { ExperimentDefaults } from './config.js';
import type { ExperimentState, ExperimentStatus, RunAction } from '../src/types/index.js';

// ============================================================================
// Status & decision
// ============================================================================

export function initialState(defaults: ExperimentDefaults): ExperimentState {
  return {
    startDate: defaults.startDate,
    endDate: defaults.endDate,
    finalReportDate: defaults.finalReportDate,
    runCount: 0,
    maxRuns: defaults.maxRuns,
    finalReportGenerated: false,
    lastRunDate: null,
  };
}

function completionReason(state: ExperimentState, today: string): string | null {
  if (today > state.endDate) return `past end date ${state.endDate}`;
  if (state.runCount >= state.maxRuns) return `all ${state.maxRuns} runs completed`;
  return null;
}

export function deriveStatus(state: ExperimentState | null, today: string): ExperimentStatus {
  if (!state) return 'NOT_STARTED';
  if (state.finalReportGenerated) return 'FINALIZED';
  if (completionReason(state, today)) return 'COMPLETE';
  return 'ACTIVE';
}

function shouldFinalize(state: ExperimentState, today: string, recordCount: number): boolean {
  return today === state.finalReportDate && !state.finalReportGenerated && recordCount > 0;
}

/**
 * Decide what today's invocation should do. Pure: same inputs, same answer.
 */
export function decideAction(
  today: string,
  state: ExperimentState,
  recordCount: number,
  isMarketDay: (day: string) => boolean
): RunAction {
  if (shouldFinalize(state, today, recordCount)) {
    return { kind: 'FINALIZE' };
  }

  if (state.finalReportGenerated) {
    return { kind: 'SKIP_COMPLETE', reason: 'final report already generated' };
  }

  const complete = completionReason(state, today);
  if (complete) {
    return { kind: 'SKIP_COMPLETE', reason: complete };
  }

  if (today < state.startDate) {
    return { kind: 'SKIP_BEFORE_START', startDate: state.startDate };
  }

  if (state.lastRunDate === today) {
    return { kind: 'SKIP_ALREADY_RAN' };
  }

  if (!isMarketDay(today)) {
    return { kind: 'SKIP_NON_MARKET_DAY' };
  }

  return { kind: 'RUN', dayNumber: state.runCount + 1 };
}

// ============================================================================
// Transitions
// ============================================================================

export type TransitionEvent = 'run' | 'finalize';

export interface TransitionResult {
  success: boolean;
  error?: string;
  state?: ExperimentState;
}

interface TransitionRule {
  event: TransitionEvent;
  from: ExperimentStatus[];
  validate: (state: ExperimentState, today: string) => string | null; // error or null
  apply: (state: ExperimentState, today: string) => ExperimentState;
}

const TRANSITIONS: TransitionRule[] = [
  {
    event: 'run',
    from: ['ACTIVE'],
    validate: (s, today) => {
      if (today < s.startDate) return `Experiment starts on ${s.startDate}`;
      if (s.lastRunDate === today) return `Already ran on ${today}`;
      return null;
    },
    apply: (s, today) => ({ ...s, runCount: s.runCount + 1, lastRunDate: today }),
  },
  {
    event: 'finalize',
    from: ['ACTIVE', 'COMPLETE'],
    validate: () => null,
    apply: (s) => ({ ...s, finalReportGenerated: true }),
  },
];

export function applyTransition(
  state: ExperimentState,
  event: TransitionEvent,
  today: string
): TransitionResult {
  const rule = TRANSITIONS.find((t) => t.event === event);
  if (!rule) {
    return { success: false, error: `Unknown transition: ${event}` };
  }

  const status = deriveStatus(state, today);
  if (!rule.from.includes(status)) {
    return {
      success: false,
      error: `Cannot ${event} while ${status} (allowed from: ${rule.from.join(', ')})`,
    };
  }

  const error = rule.validate(state, today);
  if (error) {
    return { success: false, error };
  }

  return { success: true, state: rule.apply(state, today) };
}

// ============================================================================
// Persistence
// ============================================================================

const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const PersistedStateSchema = z.object({
  start_date: day,
  end_date: day,
  final_report_date: day,
  run_count: z.number().int().min(0),
  max_runs: z.number().int().positive(),
  final_report_generated: z.boolean(),
  last_run_date: day.nullable().optional(),
});

type PersistedState = z.infer<typeof PersistedStateSchema>;

function toPersisted(state: ExperimentState): PersistedState {
  return {
    start_date: state.startDate,
    end_date: state.endDate,
    final_report_date: state.finalReportDate,
    run_count: state.runCount,
    max_runs: state.maxRuns,
    final_report_generated: state.finalReportGenerated,
    last_run_date: state.lastRunDate,
  };
}

function fromPersisted(data: PersistedState): ExperimentState {
  return {
    startDate: data.start_date,
    endDate: data.end_date,
    finalReportDate: data.final_report_date,
    runCount: data.run_count,
    maxRuns: data.max_runs,
    finalReportGenerated: data.final_report_generated,
    lastRunDate: data.last_run_date ?? null,
  };
}

export class ExperimentStateStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Returns null when no state has been written yet. A file that exists but
   * cannot be parsed is fatal: guessing would risk double-counting days.
   */
  load(): ExperimentState | null {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new StateFileError(this.filePath, 'unreadable', { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StateFileError(this.filePath, 'not valid JSON', { cause: error });
    }

    const parsed = PersistedStateSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
      throw new StateFileError(this.filePath, `invalid fields: ${fields}`);
    }
    return fromPersisted(parsed.data);
  }

  save(state: ExperimentState): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(toPersisted(state), null, 2) + '\n');
    fs.renameSync(tmp, this.filePath);
  }

  /**
   * Load, or create and persist the initial state on first invocation.
   */
  loadOrInitialize(defaults: ExperimentDefaults): { state: ExperimentState; created: boolean } {
    const existing = this.load();
    if (existing) return { state: existing, created: false };

    const state = initialState(defaults);
    this.save(state);
    return { state, created: true };
  }
}
