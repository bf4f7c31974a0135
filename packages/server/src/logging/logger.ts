import { getConfig, type LogLevel } from '../config/index.js';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Render an error for a log line without leaking non-Error payloads
 */
export function serializeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

/**
 * Structured JSON logger writing one line per record to the console.
 *
 * Never pass passwords or raw token values in the context; jtis and record
 * ids are fine.
 */
export function createLogger(
  component: string,
  options: { level?: LogLevel; context?: LogContext } = {}
): Logger {
  const threshold = LEVEL_WEIGHT[options.level ?? getConfig().logging.level];
  const baseContext = options.context ?? {};

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
    if (LEVEL_WEIGHT[level] < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...baseContext,
      ...context,
    });

    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) =>
      createLogger(component, {
        level: options.level,
        context: { ...baseContext, ...context },
      }),
  };
}
