import type { AppConfig, LogLevel } from '../../shared/config';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
}

const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
  const payload = JSON.stringify({
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  });
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, bindings: LogMeta): Logger => {
  const write = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    // Errors are always written.
    if (level !== 'error' && levelWeights[level] < threshold) return;
    emit(level, message, { ...bindings, ...meta });
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (extra) => buildLogger(threshold, { ...bindings, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

/** Drops everything. Used where a logger is optional and none was passed. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
