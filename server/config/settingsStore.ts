import fs from 'node:fs/promises';
import path from 'node:path';
import JSON5 from 'json5';
import { MergeSettingsSchema, type MergeSettings } from '../../shared/config';
import { errorMessage } from '../catalog/errors';
import { silentLogger, type Logger } from '../obs/logger';
import { isRecord, type JsonRecord } from '../utils/records';

export const DEFAULT_SETTINGS: JsonRecord = {
  default_sources: {
    urls: [],
    files: [],
  },
  base_template: {
    enabled: false,
    url: '',
  },
  settings: {
    similarity_threshold: 0.7,
    request_timeout: 30,
    default_output_filename: 'templates.json',
    auto_detect_architecture: true,
  },
};

export interface SettingsStore {
  readonly filePath: string;
  /** Dotted lookup (`settings.request_timeout`); `fallback` when any segment is missing. */
  get: (key: string, fallback?: unknown) => unknown;
  /** Dotted write. Missing or non-object intermediate segments are replaced with objects. */
  set: (key: string, value: unknown) => void;
  save: () => Promise<void>;
  snapshot: () => JsonRecord;
}

const cloneDocument = (doc: JsonRecord): JsonRecord => structuredClone(doc);

// File values win; defaults fill the sections and keys the file leaves out.
const mergeWithDefaults = (defaults: JsonRecord, loaded: JsonRecord): JsonRecord => {
  const merged = cloneDocument(defaults);
  for (const [key, value] of Object.entries(loaded)) {
    const base = merged[key];
    merged[key] = isRecord(base) && isRecord(value) ? mergeWithDefaults(base, value) : value;
  }
  return merged;
};

export const createSettingsStore = (filePath: string, initial: JsonRecord = DEFAULT_SETTINGS): SettingsStore => {
  const document = cloneDocument(initial);

  const get = (key: string, fallback?: unknown): unknown => {
    let current: unknown = document;
    for (const segment of key.split('.')) {
      if (!isRecord(current) || !(segment in current)) return fallback;
      current = current[segment];
    }
    return current;
  };

  const set = (key: string, value: unknown) => {
    const segments = key.split('.');
    const last = segments.pop();
    if (!last) return;
    let current = document;
    for (const segment of segments) {
      const next = current[segment];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: JsonRecord = {};
        current[segment] = created;
        current = created;
      }
    }
    current[last] = value;
  };

  const save = async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  };

  return {
    filePath,
    get,
    set,
    save,
    snapshot: () => cloneDocument(document),
  };
};

/** Reads the settings file. A missing or unreadable file falls back to the defaults. */
export const loadSettingsStore = async (
  filePath: string,
  options: { logger?: Logger } = {},
): Promise<SettingsStore> => {
  const logger = options.logger ?? silentLogger;
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.warn('Settings file not readable, using defaults', { filePath, error: errorMessage(error) });
    return createSettingsStore(filePath);
  }

  try {
    const parsed: unknown = JSON5.parse(raw);
    if (!isRecord(parsed)) {
      logger.warn('Settings file is not an object, using defaults', { filePath });
      return createSettingsStore(filePath);
    }
    return createSettingsStore(filePath, mergeWithDefaults(DEFAULT_SETTINGS, parsed));
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', { filePath, error: errorMessage(error) });
    return createSettingsStore(filePath);
  }
};

const numberSetting = (store: SettingsStore, key: string, fallback: number): number => {
  const value = store.get(key);
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
};

const booleanSetting = (store: SettingsStore, key: string, fallback: boolean): boolean => {
  const value = store.get(key);
  return typeof value === 'boolean' ? value : fallback;
};

const stringSetting = (store: SettingsStore, key: string, fallback: string): string => {
  const value = store.get(key);
  return typeof value === 'string' ? value : fallback;
};

const stringListSetting = (store: SettingsStore, key: string): string[] => {
  const value = store.get(key);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
};

/**
 * Typed view of the settings the merge reads. Wrongly typed values fall back
 * to the defaults; a threshold outside [0, 1] is rejected.
 */
export const readMergeSettings = (store: SettingsStore): MergeSettings =>
  MergeSettingsSchema.parse({
    similarityThreshold: numberSetting(store, 'settings.similarity_threshold', 0.7),
    requestTimeoutSeconds: numberSetting(store, 'settings.request_timeout', 30),
    defaultOutputFilename: stringSetting(store, 'settings.default_output_filename', 'templates.json'),
    autoDetectArchitecture: booleanSetting(store, 'settings.auto_detect_architecture', true),
    defaultSources: {
      urls: stringListSetting(store, 'default_sources.urls'),
      files: stringListSetting(store, 'default_sources.files'),
    },
    baseTemplate: {
      enabled: booleanSetting(store, 'base_template.enabled', false),
      url: stringSetting(store, 'base_template.url', ''),
    },
  });
