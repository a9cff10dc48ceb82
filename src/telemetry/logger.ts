type LogContext = Record<string, unknown>;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

type LoggerFn = (message: string, context?: LogContext) => void;

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (level === 'debug' && !debugEnabled) return;
  // stdout carries `--json` reports from the CLI; every log line goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  const line = `[praxis:${level}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
