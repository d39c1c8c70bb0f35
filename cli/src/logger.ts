import chalk from 'chalk';
import { LogFields, Logger, LogLevel, shouldLog, silentLogger } from '@veriframe/core';

const LEVEL_COLORS: Record<LogLevel, chalk.Chalk> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

export function formatLogLine(level: LogLevel, message: string, fields: LogFields = {}): string {
  const extras = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => chalk.gray(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`));
  return [LEVEL_COLORS[level](level.toUpperCase().padEnd(5)), message, ...extras].join(' ');
}

/**
 * Console logger for --verbose runs. Writes to stderr so that --json output
 * on stdout stays parseable.
 */
export function createConsoleLogger(threshold: LogLevel = 'info'): Logger {
  const write = (level: LogLevel) => (message: string, fields?: LogFields) => {
    if (shouldLog(threshold, level)) {
      console.error(formatLogLine(level, message, fields));
    }
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error')
  };
}

export function loggerFor(verbose?: boolean): Logger {
  return verbose ? createConsoleLogger('debug') : silentLogger;
}
