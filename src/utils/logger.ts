import * as fs from "fs";
import * as path from "path";
import { nyCalendarDay } from "../../lib/calendar.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_COLORS = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  reset: "\x1b[0m",
};

function describe(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === "string") return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

class Logger {
  private level: LogLevel = "info";
  private logDir: string | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Mirror every emitted line (uncoloured) into a daily audit file under `dir`.
   * Pass null to stop writing files.
   */
  setLogDir(dir: string | null): void {
    if (dir) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.logDir = dir;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, component: string, message: string, timestamp: string): string {
    const color = LOG_COLORS[level];
    const reset = LOG_COLORS.reset;
    return `${color}[${timestamp}] [${level.toUpperCase()}] [${component}]${reset} ${message}`;
  }

  private append(level: LogLevel, component: string, message: string, data: unknown, now: Date): void {
    if (!this.logDir) return;
    const file = path.join(this.logDir, `run-${nyCalendarDay(now)}.log`);
    const timestamp = now.toISOString();
    const line = `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}${describe(data)}`;
    fs.appendFileSync(file, line + "\n");
  }

  private emit(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;
    const now = new Date();
    const line = this.format(level, component, message, now.toISOString());
    const write = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    write(line, data ?? "");
    this.append(level, component, message, data, now);
  }

  debug(component: string, message: string, data?: unknown): void {
    this.emit("debug", component, message, data);
  }

  info(component: string, message: string, data?: unknown): void {
    this.emit("info", component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.emit("warn", component, message, data);
  }

  error(component: string, message: string, data?: unknown): void {
    this.emit("error", component, message, data);
  }
}

export const logger = new Logger();
