import chalk from 'chalk';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  scope?: string;
  message: string;
  metadata?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.bgRed.white,
};

export class EventsLogger {
  private level: LogLevel = 'info';
  private consoleOutputEnabled = true;
  private subscribers: Set<(entry: LogEntry) => void> = new Set();

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  subscribe(cb: (entry: LogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Record an entry, returning the materialized entry or `undefined` when the
   * active level filters it out.
   */
  log(entry: Omit<LogEntry, 'timestamp'>): LogEntry | undefined {
    if (!this.isEnabled(entry.level)) return undefined;
    const fullEntry: LogEntry = { timestamp: new Date().toISOString(), ...entry };
    this.handleEntry(fullEntry);
    return fullEntry;
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    return this.log({ level: 'debug', message, metadata });
  }

  info(message: string, metadata?: Record<string, unknown>) {
    return this.log({ level: 'info', message, metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    return this.log({ level: 'warn', message, metadata });
  }

  error(message: string, metadata?: Record<string, unknown>) {
    return this.log({ level: 'error', message, metadata });
  }

  private handleEntry(entry: LogEntry) {
    for (const sub of this.subscribers) {
      try {
        sub(entry);
      } catch (err) {
        // A broken subscriber must not take the emitting code down with it.
        console.error(chalk.red('Log subscriber failed:'), err);
      }
    }

    if (!this.consoleOutputEnabled) return;
    console.log(formatLogLine(entry, true));
  }
}

/**
 * `[HH:MM:SS] [LEVEL] <scope>: message`, colored when `color` is set.
 */
export function formatLogLine(entry: LogEntry, color = false): string {
  const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const levelStr = `[${entry.level.toUpperCase()}]`;
  const scopeStr = entry.scope ? ` <${entry.scope}>` : '';

  if (!color) return `[${timeStr}] ${levelStr}${scopeStr}: ${entry.message}`;

  const prefix = chalk.gray(`[${timeStr}]`);
  const scope = entry.scope ? ` <${chalk.hex('#FFA500')(entry.scope)}>` : '';
  return `${prefix} ${LEVEL_COLORS[entry.level](levelStr)}${scope}: ${entry.message}`;
}

export const logger = new EventsLogger();
