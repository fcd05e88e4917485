/**
 * Telegram Alerts
 *
 * Notification sink for the experiment. Two messages exist:
 * - daily_update: after a completed daily run, with the result table attached
 * - final_report: after finalization, with the table and summary attached
 *
 * Delivery is best effort: every failure is logged and reported as `false`.
 */

import { escapeMarkdown, fmt, sendDocument, sendMessage, type TelegramTarget } from '../telegram/bot.js';
import { formatAccuracy } from '../../lib/aggregator.js';
import { logger } from '../../src/utils/logger.js';
import type { Summary, TickerSkip } from '../../src/types/index.js';

export interface DailyUpdateAlert {
  type: 'daily_update';
  date: string;
  dayNumber: number;
  maxRuns: number;
  endDate: string;
  recorded: string[];
  skipped: TickerSkip[];
}

export interface FinalReportAlert {
  type: 'final_report';
  summary: Summary;
}

export type Alert = DailyUpdateAlert | FinalReportAlert;

export interface Notifier {
  notify(alert: Alert, attachments: string[]): Promise<boolean>;
}

// Alert formatters
export function formatDailyUpdate(alert: DailyUpdateAlert): string {
  let msg = `📈 ${fmt.bold(`Stock Prediction Results - Day ${alert.dayNumber}`)}\n\n`;
  msg += `${fmt.bold('Day:')} ${alert.dayNumber} of ${alert.maxRuns}\n`;
  msg += `${fmt.bold('Date:')} ${escapeMarkdown(alert.date)}\n`;
  msg += `${fmt.bold('Recorded:')} ${escapeMarkdown(alert.recorded.join(', ') || 'none')}`;

  if (alert.skipped.length > 0) {
    const skipped = alert.skipped.map((s) => `${s.ticker} (${s.reason})`).join(', ');
    msg += `\n${fmt.bold('Skipped:')} ${escapeMarkdown(skipped)}`;
  }

  msg += `\n\n${fmt.italic(`Experiment runs until ${alert.endDate}`)}`;
  return msg;
}

export function formatFinalReport(alert: FinalReportAlert): string {
  const s = alert.summary;
  let msg = `🏁 ${fmt.bold('Stock Prediction Experiment - FINAL REPORT')}\n\n`;
  msg += `${fmt.bold('Period:')} ${escapeMarkdown(`${s.periodStart} to ${s.periodEnd}`)}\n`;
  msg += `${fmt.bold('Predictions:')} ${s.totalPredictions}\n`;
  msg += `${fmt.bold('Trading days:')} ${s.tradingDays}\n\n`;
  msg += `${fmt.bold('Accuracy')}\n`;

  for (const v of s.byVariant) {
    msg += escapeMarkdown(`• Prompt ${v.variant} (${v.name}): ${v.correct}/${v.total} = ${formatAccuracy(v.accuracy)}`) + '\n';
  }

  return msg.trimEnd();
}

export function formatAlert(alert: Alert): string {
  switch (alert.type) {
    case 'daily_update':
      return formatDailyUpdate(alert);
    case 'final_report':
      return formatFinalReport(alert);
  }
}

export class TelegramNotifier implements Notifier {
  constructor(private readonly target: TelegramTarget | null) {}

  async notify(alert: Alert, attachments: string[]): Promise<boolean> {
    if (!this.target) {
      logger.info('TelegramAlerts', `Telegram not configured, skipping ${alert.type} notification`);
      return false;
    }

    const messageId = await sendMessage(formatAlert(alert), this.target);
    if (messageId === null) return false;

    let delivered = true;
    for (const file of attachments) {
      const documentId = await sendDocument(file, this.target);
      delivered = delivered && documentId !== null;
    }

    if (delivered) {
      logger.info('TelegramAlerts', `Sent ${alert.type} notification with ${attachments.length} attachment(s)`);
    }
    return delivered;
  }
}
