import type { CanonicalTemplate, SourceOutcome, SourceSummary, TemplateCollection } from '../../shared/types';

export const BASE_TEMPLATE_PREFIX = 'BASE_TEMPLATE:';

const MAX_URL_LABEL = 50;
const URL_TAIL = 40;

export const isBaseTemplateSource = (sourceId: string): boolean => sourceId.startsWith(BASE_TEMPLATE_PREFIX);

const lastSegment = (value: string): string => value.split('/').pop() ?? value;

/**
 * Short label for a source id: `Base Template (index.json)` for the base
 * template, the tail of long URLs, and the base name of file paths.
 */
export const sourceDisplayName = (sourceId: string): string => {
  if (isBaseTemplateSource(sourceId)) {
    return `Base Template (${lastSegment(sourceId.slice(BASE_TEMPLATE_PREFIX.length))})`;
  }
  if (/^https?:\/\//i.test(sourceId)) {
    return sourceId.length > MAX_URL_LABEL ? `...${sourceId.slice(-URL_TAIL)}` : sourceId;
  }
  return lastSegment(sourceId.replace(/\\/g, '/'));
};

export const summarizeSources = (outcomes: SourceOutcome[], manualCount = 0): SourceSummary => {
  const baseLines: string[] = [];
  const sourceLines: string[] = [];
  let sourceCount = 0;
  let templateCount = 0;

  if (manualCount > 0) {
    sourceCount += 1;
    templateCount += manualCount;
    sourceLines.push(`✓ Manual Entry: ${manualCount} templates`);
  }

  for (const outcome of outcomes) {
    const name = sourceDisplayName(outcome.sourceId);
    const target = isBaseTemplateSource(outcome.sourceId) ? baseLines : sourceLines;
    if (!outcome.ok) {
      target.push(`✗ ${name}: ${outcome.error.message}`);
      continue;
    }
    const count = outcome.collection.templates.length;
    sourceCount += 1;
    templateCount += count;
    target.push(`✓ ${name}: ${count} templates`);
  }

  return {
    lines: [
      `Total sources processed: ${sourceCount}`,
      `Total templates found: ${templateCount}`,
      ...baseLines,
      ...sourceLines,
    ],
    sourceCount,
    templateCount,
  };
};

/** Sorted, lower-cased, de-duplicated category names across collections and manual records. */
export const collectCategories = (
  collections: TemplateCollection[],
  manualRecords: CanonicalTemplate[] = [],
): string[] => {
  const categories = new Set<string>();
  const templates = [...collections.flatMap((collection) => collection.templates), ...manualRecords];
  for (const template of templates) {
    if (!Array.isArray(template.categories)) continue;
    for (const category of template.categories) {
      if (typeof category !== 'string') continue;
      const cleaned = category.trim().toLowerCase();
      if (cleaned) categories.add(cleaned);
    }
  }
  return [...categories].sort();
};

export const formatDedupReport = (originalCount: number, finalCount: number): string[] => [
  '--- Processing Complete ---',
  `Original templates: ${originalCount}`,
  `Final templates: ${finalCount}`,
  `Duplicates removed: ${originalCount - finalCount}`,
];
