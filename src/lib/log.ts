/**
 * Run log output.
 *
 * Every decision (exclusion, warning, failure) goes through a Logger so that
 * tests can record it; the console logger tags each line with its severity.
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Prints a banner separating phases of the run */
  section(title: string): void;
}

const RULE = '========================================';

export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(`${chalk.green('[INFO]')} ${message}`),
    warn: (message) => console.log(`${chalk.yellow('[WARN]')} ${message}`),
    error: (message) => console.error(`${chalk.red('[ERROR]')} ${message}`),
    section: (title) => {
      console.log(`\n${chalk.blue(RULE)}`);
      console.log(chalk.blue(title));
      console.log(`${chalk.blue(RULE)}\n`);
    },
  };
}

export type LogLevel = 'info' | 'warn' | 'error' | 'section';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every line in memory. Used by tests and by `discover`
 * when output is rendered as JSON.
 */
export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    section: push('section'),
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
  };
}
