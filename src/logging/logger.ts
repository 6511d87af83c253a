import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, BridgeEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

export interface LogContext {
  issueNumber?: number;
  ticketKey?: string;
  rowIndex?: number;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_DIR = join(homedir(), '.vuln-issue-bridge', 'logs');

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;
  private fileDisabled = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? DEFAULT_LOG_DIR,
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    this.logFile = join(this.opts.logDir, `${this.opts.source}.log`);
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  private formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [
      entry.ticketKey ?? null,
      entry.issueNumber != null ? `#${entry.issueNumber}` : null,
      entry.rowIndex != null ? `row ${entry.rowIndex + 1}` : null,
    ]
      .filter(Boolean)
      .join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this.fileDisabled) return;

    try {
      await this.ensureDir();
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      // One notice, then console-only for the rest of the run
      this.fileDisabled = true;
      console.warn(`Log file ${this.logFile} is not writable; continuing without it: ${String(err)}`);
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: BridgeEvent, level: LogLevel = 'info'): void {
    void this.writeEntry(this.buildEntry(level, event.type, { data: { ...event } }));
  }

  /**
   * Create a logger writing to its own file under the same directory.
   */
  child(source: string): Logger {
    return new Logger({
      logDir: this.opts.logDir,
      level: this.opts.level,
      console: this.opts.console,
      source,
    });
  }
}
