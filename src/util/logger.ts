import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('debug'),
  info: chalk.blue('info '),
  warn: chalk.yellow('warn '),
  error: chalk.red('error'),
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

/**
 * Leveled logger. Writes to stderr so command output on stdout stays
 * machine-readable.
 */
export function createLogger(
  scope: string,
  level: LogLevel = parseLogLevel(process.env.MEMVAULT_LOG_LEVEL),
  write: (line: string) => void = (line) => process.stderr.write(line + '\n')
): Logger {
  const threshold = LEVELS[level];

  const emit = (lvl: LogLevel, message: string): void => {
    if (LEVELS[lvl] < threshold) return;
    write(`${LABELS[lvl]} ${chalk.dim(`[${scope}]`)} ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
