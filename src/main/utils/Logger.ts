/**
 * stderr-only component logger.
 *
 * stdout is reserved for recognized text when running the CLI.
 * All diagnostic output goes to stderr, prefixed with the component name.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveMinimumLevel(): LogLevel {
  const raw = process.env.SPEECHGATE_LOG_LEVEL?.toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return 'info';
}

function write(level: LogLevel, component: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinimumLevel()]) {
    return;
  }
  const prefix = level === 'info' ? '' : `${level.toUpperCase()}: `;
  process.stderr.write(`[${component}] ${prefix}${message}\n`);
}

export function createLogger(component: string): Logger {
  return {
    debug: (message) => write('debug', component, message),
    info: (message) => write('info', component, message),
    warn: (message) => write('warn', component, message),
    error: (message, error) => {
      const errorStr = error === undefined ? '' : ` - ${error instanceof Error ? error.message : String(error)}`;
      write('error', component, `${message}${errorStr}`);
    },
  };
}
