import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function createLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel): boolean => LEVELS.indexOf(level) >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) {
        console.log(chalk.gray(message));
      }
    },
    info(message) {
      if (enabled('info')) {
        console.log(message);
      }
    },
    warn(message) {
      if (enabled('warn')) {
        console.warn(chalk.yellow(`⚠️  ${message}`));
      }
    },
    error(message, error) {
      if (!enabled('error')) {
        return;
      }

      console.error(chalk.red(`✗ ${message}`));

      if (error instanceof Error && minLevel === 'debug') {
        console.error(chalk.gray(error.stack ?? error.message));
      }
    },
  };
}

const envLevel = process.env.TIDYTRACKS_LOG_LEVEL;

export const logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info');
