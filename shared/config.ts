import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  sources: z.object({
    concurrency: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  persistence: z.object({
    outputDir: z.string().min(1),
    settingsFile: z.string().min(1),
  }),
  observability: z.object({
    logLevel: LogLevelSchema,
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type LogLevel = z.infer<typeof LogLevelSchema>;

/** The slice of the settings document that the merge pipeline reads. */
export const MergeSettingsSchema = z.object({
  similarityThreshold: z.number().min(0).max(1),
  requestTimeoutSeconds: z.number().positive(),
  defaultOutputFilename: z.string().min(1),
  autoDetectArchitecture: z.boolean(),
  defaultSources: z.object({
    urls: z.array(z.string()),
    files: z.array(z.string()),
  }),
  baseTemplate: z.object({
    enabled: z.boolean(),
    url: z.string(),
  }),
});

export type MergeSettings = z.infer<typeof MergeSettingsSchema>;

export interface PublicConfig {
  similarityThreshold: number;
  requestTimeoutSeconds: number;
  defaultOutputFilename: string;
  defaultSources: {
    urls: string[];
    files: string[];
  };
  baseTemplate: {
    enabled: boolean;
    url: string;
  };
}

export const getPublicConfig = (settings: MergeSettings): PublicConfig => ({
  similarityThreshold: settings.similarityThreshold,
  requestTimeoutSeconds: settings.requestTimeoutSeconds,
  defaultOutputFilename: settings.defaultOutputFilename,
  defaultSources: {
    urls: [...settings.defaultSources.urls],
    files: [...settings.defaultSources.files],
  },
  baseTemplate: { ...settings.baseTemplate },
});
