export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

let threshold: LogLevel = 'error';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function emit(
  level: Exclude<LogLevel, 'silent'>,
  event: string,
  data?: Record<string, unknown>
): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {}),
  };
  // stdout belongs to the chat prompt
  console.error(JSON.stringify(payload));
}

/** JSON-lines logger shared by the runtime modules. */
export const logger: Logger = {
  debug(event, data) {
    emit('debug', event, data);
  },
  info(event, data) {
    emit('info', event, data);
  },
  warn(event, data) {
    emit('warn', event, data);
  },
  error(event, data) {
    emit('error', event, data);
  },
};
