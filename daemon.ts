import { spawn } from 'child_process';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type AppConfig } from './lib/config.js';
import { DailyScheduler } from './lib/scheduler.js';
import { nyCalendarDay, nyTimeOfDay } from './lib/calendar.js';
import { errorMessage } from './lib/errors.js';
import { sendMessage, resolveChatId, escapeMarkdown, fmt } from './tools/telegram/bot.js';
import { logger } from './src/utils/logger.js';

const ROOT_DIR = path.dirname(fileURLToPath(import.meta.url));
const PIPELINE = 'tools/pipelines/daily-run.ts';
const CHECK_INTERVAL_MS = 60 * 1000;
const COMPONENT = 'Daemon';

export interface PipelineResult {
  success: boolean;
  output: string;
}

/**
 * The pipeline prints one JSON line `{ success, ... }` last; everything before
 * it is log output.
 */
export function parsePipelineOutput(output: string): Record<string, unknown> | null {
  const lines = output.trim().split('\n').reverse();
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('{')) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed) && 'success' in parsed) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      continue;
    }
  }
  return null;
}

function executePipeline(args: string[] = []): Promise<PipelineResult> {
  return new Promise((resolve) => {
    const fullPath = path.join(ROOT_DIR, PIPELINE);
    logger.info(COMPONENT, `Running pipeline: ${fullPath} ${args.join(' ')}`.trim());

    const proc = spawn('npx', ['tsx', fullPath, ...args], {
      cwd: ROOT_DIR,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout += text;
      process.stdout.write(text);
    });

    proc.stderr.on('data', (data: Buffer) => {
      const text = data.toString();
      stderr += text;
      process.stderr.write(text);
    });

    proc.on('close', (code: number | null) => {
      resolve({ success: code === 0, output: stdout || stderr });
    });

    proc.on('error', (error: Error) => {
      resolve({ success: false, output: error.message });
    });
  });
}

async function sendTelegramAlert(config: AppConfig, message: string): Promise<void> {
  const token = config.telegram.botToken;
  const chatId = resolveChatId(config.telegram.chatId, path.join(config.stateDir, 'telegram_chat_id.txt'));
  if (!token || !chatId) return;
  await sendMessage(message, { token, chatId });
}

async function runDaemon(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  logger.setLogDir(path.join(config.stateDir, 'logs'));

  const scheduler = new DailyScheduler({
    runAt: config.runAt,
    job: async (day) => {
      const result = await executePipeline();
      const summary = parsePipelineOutput(result.output);
      if (!result.success) {
        const reason = summary && typeof summary.error === 'string' ? summary.error : result.output.slice(-200);
        await sendTelegramAlert(config, `❌ ${fmt.bold('Daily run failed')}\n${escapeMarkdown(`${day}: ${reason}`)}`);
        throw new Error(`Pipeline failed: ${reason}`);
      }
      logger.info(COMPONENT, `Daily run for ${day} finished`, summary ?? undefined);
    },
  });

  logger.info(COMPONENT, `Daemon starting, daily run after ${config.runAt} New York time`);
  await sendTelegramAlert(config, `🤖 ${fmt.bold('Daemon started')}\nRuns daily after ${escapeMarkdown(config.runAt)} New York time`);

  const tick = async (): Promise<void> => {
    const outcome = await scheduler.tick();
    if (outcome === 'waiting') {
      logger.debug(COMPONENT, `Waiting for ${config.runAt} (now ${nyTimeOfDay()})`);
    }
  };

  await tick();
  setInterval(() => {
    tick().catch((error) => logger.error(COMPONENT, 'Tick failed', errorMessage(error)));
  }, CHECK_INTERVAL_MS);

  logger.info(COMPONENT, 'Daemon running (1 min check interval). Press Ctrl+C to stop.');
}

async function trigger(): Promise<void> {
  const result = await executePipeline();
  const summary = parsePipelineOutput(result.output);
  console.log(`\nManual run for ${nyCalendarDay()}: ${result.success ? 'ok' : 'failed'}`);
  if (summary) console.log(JSON.stringify(summary, null, 2));
  if (!result.success) process.exitCode = 1;
}

function usage(): void {
  console.log(`
Direction Experiment Daemon

Usage:
  npx tsx daemon.ts start    - Start the daemon (runs continuously)
  npx tsx daemon.ts status   - Show experiment state and today's decision
  npx tsx daemon.ts trigger  - Run today's cycle now
`);
}

// CLI commands
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  const command = process.argv[2];

  switch (command) {
    case 'start':
      runDaemon().catch((error) => {
        logger.error(COMPONENT, 'Daemon failed to start', errorMessage(error));
        process.exitCode = 1;
      });
      break;

    case 'status':
      executePipeline(['--status'])
        .then((result) => {
          if (!result.success) process.exitCode = 1;
        })
        .catch((error) => logger.error(COMPONENT, 'Status failed', errorMessage(error)));
      break;

    case 'trigger':
      trigger().catch((error) => {
        logger.error(COMPONENT, 'Trigger failed', errorMessage(error));
        process.exitCode = 1;
      });
      break;

    default:
      usage();
  }
}
