export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return '';
  }
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) =>
      typeof value === 'string' && /\s/.test(value) ? `${key}=${JSON.stringify(value)}` : `${key}=${String(value)}`
    );
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const stamp = `${new Date().toISOString()} ${entryLevel.toUpperCase().padEnd(5, ' ')} [${scope}]`;
    const line = `${stamp} ${message}${formatFields(fields)}`;
    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level)
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
