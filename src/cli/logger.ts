export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

/**
 * Line-oriented logger of the command line.
 *
 * Every level writes to `write` (stderr in practice), so that `--stdout`
 * output stays clean for piping. Lines below `level` are dropped.
 *
 * The library itself never logs; it returns diagnostics.
 */
export function createLogger(level: LogLevel, write: (line: string) => void): Logger {
  const log = (messageLevel: LogLevel, message: string): void => {
    if (LEVEL_PRIORITY[messageLevel] < LEVEL_PRIORITY[level]) return;
    write(`${message}\n`);
  };

  return {
    debug: message => log('debug', message),
    info: message => log('info', message),
    warn: message => log('warn', message),
    error: message => log('error', message)
  };
}
