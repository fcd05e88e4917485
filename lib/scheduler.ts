/**
 * Daily Scheduler
 *
 * Wall-clock gate for the daemon: a job runs at most once per New York day,
 * after RUN_AT, and never overlaps itself. The experiment state still decides
 * what the run does; this only decides when to ask.
 */

import { nyCalendarDay, nyTimeOfDay } from './calendar.js';
import { errorMessage } from './errors.js';
import { logger } from '../src/utils/logger.js';

export type TickResult = 'ran' | 'waiting' | 'busy' | 'done-today' | 'failed';

export interface SchedulerOptions {
  runAt: string; // HH:mm, New York time
  job: (day: string) => Promise<void>;
  now?: () => Date;
}

export function isDue(now: Date, runAt: string, lastRunDay: string | null): boolean {
  if (lastRunDay === nyCalendarDay(now)) return false;
  return nyTimeOfDay(now) >= runAt;
}

export class DailyScheduler {
  private lastRunDay: string | null = null;
  private running = false;
  private readonly now: () => Date;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get lastRun(): string | null {
    return this.lastRunDay;
  }

  async tick(): Promise<TickResult> {
    if (this.running) return 'busy';

    const now = this.now();
    const day = nyCalendarDay(now);
    if (this.lastRunDay === day) return 'done-today';
    if (!isDue(now, this.options.runAt, this.lastRunDay)) return 'waiting';

    this.running = true;
    // Marked before the job so a failing run is not retried every minute
    this.lastRunDay = day;
    try {
      await this.options.job(day);
      return 'ran';
    } catch (error) {
      logger.error('Scheduler', `Run for ${day} failed`, errorMessage(error));
      return 'failed';
    } finally {
      this.running = false;
    }
  }
}
