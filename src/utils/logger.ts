/**
 * Diagnostic logging for the gate.
 * Diagnostics go to stderr; stdout carries only the rendered findings.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const STYLES: Record<EmittingLevel, { label: string; color: ChalkInstance }> = {
  debug: { label: 'DEBUG', color: chalk.gray },
  info: { label: 'INFO', color: chalk.blue },
  warn: { label: 'WARN', color: chalk.yellow },
  error: { label: 'ERROR', color: chalk.red },
};

/** Receives one finished line, without the trailing newline. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

class Logger {
  private level: LogLevel = 'info';

  constructor(private readonly sink: LogSink = stderrSink) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: EmittingLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, details?: Record<string, unknown>): void {
    this.emit('debug', message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.emit('info', message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.emit('warn', message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    this.emit('error', message, details);
  }

  private emit(level: EmittingLevel, message: string, details?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { label, color } = STYLES[level];
    this.sink(color(`[${label}] ${message}`));
    if (details && Object.keys(details).length > 0) {
      this.sink(color(`  ${JSON.stringify(details)}`));
    }
  }
}

export const logger = new Logger();

export { Logger };
