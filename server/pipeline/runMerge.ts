import type { MergeSettings } from '../../shared/config';
import type { CanonicalTemplate, MergeResult, SourceOutcome, SourceSummary } from '../../shared/types';
import { mergeTemplateSources, type SourceCollection } from '../catalog/merge';
import { rankTemplateQuality } from '../catalog/quality';
import { collectCategories, formatDedupReport, summarizeSources } from '../catalog/summary';
import { findRelatedTemplates, type RelatedTemplates } from '../catalog/titles';
import { silentLogger, type Logger } from '../obs/logger';
import { loadSources } from '../sources/loadSources';
import type { MergeRequest } from './mergeRequest';
import { resolveSourceIds } from './mergeRequest';

export interface MergeResponse extends MergeResult {
  sources: SourceSummary;
  categories: string[];
  report: string[];
  /** Titles of the lowest-ranked merged templates, for review. */
  weakest: Array<{ title: string; rank: number }>;
  related: RelatedTemplates[];
}

export interface RunMergeArgs {
  request: MergeRequest;
  settings: MergeSettings;
  concurrency: number;
  userAgent?: string;
  logger?: Logger;
  signal?: AbortSignal;
  onOutcome?: (outcome: SourceOutcome) => void;
}

const WEAKEST_LIMIT = 5;

const successfulSources = (outcomes: SourceOutcome[]): SourceCollection[] =>
  outcomes.flatMap((outcome) => (outcome.ok ? [{ sourceId: outcome.sourceId, collection: outcome.collection }] : []));

const weakestTemplates = (templates: CanonicalTemplate[]) =>
  templates
    .map((template) => ({ title: template.title, rank: rankTemplateQuality(template) }))
    .sort((a, b) => a.rank - b.rank)
    .slice(0, WEAKEST_LIMIT);

/** Merges already-loaded outcomes. Failed sources only show up in the summary. */
export const buildMergeResponse = (
  outcomes: SourceOutcome[],
  manual: CanonicalTemplate[],
  settings: MergeSettings,
): MergeResponse => {
  const sources = successfulSources(outcomes);
  const merged = mergeTemplateSources(sources, manual, {
    similarityThreshold: settings.similarityThreshold,
    autoDetectArchitecture: settings.autoDetectArchitecture,
  });

  return {
    final: merged.final,
    originalCount: merged.originalCount,
    finalCount: merged.finalCount,
    duplicatesRemoved: merged.duplicatesRemoved,
    sources: summarizeSources(outcomes, manual.length),
    categories: collectCategories(
      sources.map(({ collection }) => collection),
      manual,
    ),
    report: formatDedupReport(merged.originalCount, merged.finalCount),
    weakest: weakestTemplates(merged.final.templates),
    related: findRelatedTemplates(merged.final.templates),
  };
};

export const runMerge = async ({
  request,
  settings,
  concurrency,
  userAgent,
  logger = silentLogger,
  signal,
  onOutcome,
}: RunMergeArgs): Promise<MergeResponse> => {
  const sourceIds = resolveSourceIds(request, settings);
  logger.info('Merge started', { sources: sourceIds.length, manual: request.manual.length });

  const outcomes = await loadSources(sourceIds, {
    timeoutMs: settings.requestTimeoutSeconds * 1000,
    concurrency,
    userAgent,
    signal,
    logger,
    onOutcome,
  });

  const response = buildMergeResponse(outcomes, request.manual, settings);
  logger.info('Merge finished', {
    originalCount: response.originalCount,
    finalCount: response.finalCount,
    duplicatesRemoved: response.duplicatesRemoved,
  });
  return response;
};
