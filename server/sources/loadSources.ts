import type { SourceOutcome } from '../../shared/types';
import { convertToCanonical } from '../catalog/converter';
import { DetectionUnknownError, FetchError } from '../catalog/errors';
import { silentLogger, type Logger } from '../obs/logger';
import { mapWithConcurrency } from '../utils/concurrency';
import { fetchSource } from './fetcher';

export interface LoadSourcesOptions {
  timeoutMs: number;
  concurrency: number;
  userAgent?: string;
  signal?: AbortSignal;
  logger?: Logger;
  /** Called as each source settles, in completion order. */
  onOutcome?: (outcome: SourceOutcome) => void;
}

const loadOne = async (sourceId: string, options: LoadSourcesOptions, logger: Logger): Promise<SourceOutcome> => {
  let document: unknown;
  try {
    document = await fetchSource(sourceId, {
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      signal: options.signal,
    });
  } catch (error) {
    if (!(error instanceof FetchError)) throw error;
    logger.warn('Source load failed', { sourceId, kind: error.kind, error: error.message });
    return { sourceId, ok: false, error: { kind: error.kind, message: error.message } };
  }

  const converted = convertToCanonical(document);
  if (!converted.ok) {
    const kind = converted.error instanceof DetectionUnknownError ? 'detection' : 'conversion';
    logger.warn('Source load failed', { sourceId, kind, error: converted.error.message });
    return {
      sourceId,
      ok: false,
      format: converted.error.format,
      error: { kind, message: converted.error.message },
    };
  }

  const { format, collection } = converted.value;
  logger.info('Source loaded', { sourceId, format, templates: collection.templates.length });
  return { sourceId, ok: true, format, collection };
};

/**
 * Fetches and converts every source with bounded concurrency. One failing
 * source becomes a failed outcome and never affects the others. Outcomes
 * keep the order of `sourceIds`.
 */
export const loadSources = async (sourceIds: string[], options: LoadSourcesOptions): Promise<SourceOutcome[]> => {
  const logger = options.logger ?? silentLogger;
  return await mapWithConcurrency(
    sourceIds,
    options.concurrency,
    async (sourceId) => {
      const outcome = await loadOne(sourceId, options, logger);
      options.onOutcome?.(outcome);
      return outcome;
    },
    options.signal,
  );
};
