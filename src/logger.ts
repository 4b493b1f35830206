import chalk from 'chalk';
import type { LogLevel } from './config.js';

export type Logger = (message: string, level: LogLevel) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleLoggerOptions {
  /** Write every level to stderr, keeping stdout for command output. */
  stderrOnly?: boolean;
}

export function createConsoleLogger(minLevel: LogLevel = 'info', options: ConsoleLoggerOptions = {}): Logger {
  return (msg, level) => {
    if (RANK[level] < RANK[minLevel]) return;
    const color = level === 'error' ? chalk.red
      : level === 'warn' ? chalk.yellow
      : level === 'info' ? chalk.green
      : chalk.dim;
    const line = `${chalk.dim(new Date().toISOString())} ${color(`[${level.toUpperCase()}]`)} ${msg}`;
    if (options.stderrOnly || level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };
}

export const silentLogger: Logger = () => {};
