import path from 'node:path';
import { ConfigSchema, LogLevelSchema, type AppConfig, type LogLevel } from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const logLevelFromEnv = (value: string | undefined): LogLevel => {
  const parsed = LogLevelSchema.safeParse((value || 'info').trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
};

export type { AppConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3002),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    sources: {
      concurrency: numberFromEnv(env.SOURCE_CONCURRENCY, 4),
      userAgent: env.USER_AGENT?.trim() || 'template-catalog-merger/1.0',
    },
    persistence: {
      outputDir: path.resolve(env.OUTPUT_DIR || path.join(process.cwd(), 'output')),
      settingsFile: path.resolve(env.SETTINGS_FILE || path.join(process.cwd(), 'config.json')),
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};
