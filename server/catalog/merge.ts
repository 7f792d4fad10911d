import type { CanonicalTemplate, MergeResult, TaggedTemplate, TemplateCollection } from '../../shared/types';
import { deduplicateTemplates, type DeduplicationOptions, type DuplicateRecord } from './dedup';

export const MANUAL_SOURCE_ID = 'manual_entry';

export interface SourceCollection {
  sourceId: string;
  collection: TemplateCollection;
}

export interface MergeReport extends MergeResult {
  duplicates: DuplicateRecord[];
  /** Records dropped at grouping time because their title was blank. */
  untitled: number;
}

const tagRecords = (records: CanonicalTemplate[], sourceId: string): TaggedTemplate[] =>
  records.map((record) => ({ ...record, _source: sourceId }));

/**
 * Manual records first, then every source in the order given. Inputs are
 * never mutated: tagging copies each record.
 */
export const mergeTemplateSources = (
  sources: SourceCollection[],
  manualRecords: CanonicalTemplate[] = [],
  options: DeduplicationOptions = {},
): MergeReport => {
  const allRecords: TaggedTemplate[] = [
    ...tagRecords(manualRecords, MANUAL_SOURCE_ID),
    ...sources.flatMap(({ sourceId, collection }) => tagRecords(collection.templates, sourceId)),
  ];

  const { templates, duplicates, untitled } = deduplicateTemplates(allRecords, options);

  return {
    final: { version: '2', templates },
    originalCount: allRecords.length,
    finalCount: templates.length,
    duplicatesRemoved: allRecords.length - templates.length,
    duplicates,
    untitled,
  };
};
