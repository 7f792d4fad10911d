import type { MergeSettings } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import { errorMessage } from '../catalog/errors';
import { sourceDisplayName } from '../catalog/summary';
import type { Logger } from '../obs/logger';
import { loadSources } from '../sources/loadSources';
import { parseMergeRequest, resolveSourceIds } from './mergeRequest';
import { buildMergeResponse } from './runMerge';
import { makeStageEmitter, type StageEmitter } from './stageEmitter';

export interface MergeStreamArgs {
  body: unknown;
  /** Read once per run; a settings document that fails validation ends the stream with `fatal`. */
  readSettings: () => MergeSettings;
  concurrency: number;
  userAgent?: string;
  stream: SseStream;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Streams a merge as stage events: `fetch` reports each source as it
 * settles, `convert` the per-source summary, `merge` the dedup counts. The
 * response body arrives last as a `merge-result` event.
 */
export const handleMergeStream = async ({
  body,
  readSettings,
  concurrency,
  userAgent,
  stream,
  logger,
  signal,
}: MergeStreamArgs): Promise<void> => {
  const parsed = parseMergeRequest(body);
  if (!parsed.ok) {
    stream.sendJson('fatal', { error: 'Invalid merge request', problems: parsed.error });
    stream.close();
    return;
  }

  const runId = randomId();
  const runLogger = logger.child({ runId });
  const send = stream.send;
  const fetchStage = makeStageEmitter(runId, 'fetch', send);
  const convertStage = makeStageEmitter(runId, 'convert', send);
  const mergeStage = makeStageEmitter(runId, 'merge', send);
  let currentStage: StageEmitter | null = null;

  try {
    const settings = readSettings();
    currentStage = fetchStage;
    const sourceIds = resolveSourceIds(parsed.value, settings);
    fetchStage.start({ message: `Loading ${sourceIds.length} sources`, data: { sourceIds } });

    const outcomes = await loadSources(sourceIds, {
      timeoutMs: settings.requestTimeoutSeconds * 1000,
      concurrency,
      userAgent,
      signal,
      logger: runLogger,
      onOutcome: (outcome) => {
        fetchStage.progress({
          message: `${outcome.ok ? 'Loaded' : 'Failed'} ${sourceDisplayName(outcome.sourceId)}`,
          data: outcome.ok
            ? { sourceId: outcome.sourceId, format: outcome.format, templates: outcome.collection.templates.length }
            : { sourceId: outcome.sourceId, error: outcome.error },
        });
      },
    });
    fetchStage.success({ message: 'Sources settled' });

    currentStage = convertStage;
    convertStage.start();
    const failed = outcomes.filter((outcome) => !outcome.ok).length;
    convertStage.success({
      message: `${outcomes.length - failed} of ${outcomes.length} sources converted`,
      data: { failed },
    });

    currentStage = mergeStage;
    mergeStage.start({ message: 'Deduplicating templates' });
    const response = buildMergeResponse(outcomes, parsed.value.manual, settings);
    mergeStage.success({
      message: `${response.finalCount} templates after removing ${response.duplicatesRemoved} duplicates`,
      data: {
        originalCount: response.originalCount,
        finalCount: response.finalCount,
        duplicatesRemoved: response.duplicatesRemoved,
      },
    });
    runLogger.info('Merge stream finished', { finalCount: response.finalCount });

    stream.sendJson('merge-result', response);
    stream.close();
  } catch (error) {
    const message = errorMessage(error);
    runLogger.error('Merge stream failed', { error: message });
    currentStage?.failure(error);
    stream.sendJson('fatal', { error: message });
    stream.close();
  }
};
