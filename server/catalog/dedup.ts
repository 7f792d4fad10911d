import type { CanonicalTemplate } from '../../shared/types';
import { calculateSimilarity, detectArchitecture } from './comparator';
import { isBetterTemplate } from './quality';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export interface DeduplicationOptions {
  /** Two same-titled records at or above this similarity describe the same app. */
  similarityThreshold?: number;
  /** When false, architecture differences never produce suffixed variants. */
  autoDetectArchitecture?: boolean;
}

export interface DuplicateRecord {
  template: CanonicalTemplate;
  title: string;
  /**
   * `similarity`: lost the score comparison to an existing record.
   * `superseded`: was the survivor until a better-scoring record replaced it.
   * `variant-collision`: its architecture slot was already taken by another record.
   */
  reason: 'similarity' | 'superseded' | 'variant-collision';
  similarity: number;
}

export interface DeduplicationResult {
  templates: CanonicalTemplate[];
  duplicates: DuplicateRecord[];
  untitled: number;
}

export const stripSource = (template: CanonicalTemplate): CanonicalTemplate => {
  const clean = { ...template };
  delete clean._source;
  return clean;
};

/** Groups by trimmed title in first-seen order. Records without a usable title are counted and left out. */
export const groupByTitle = (
  records: CanonicalTemplate[],
): { groups: Map<string, CanonicalTemplate[]>; untitled: number } => {
  const groups = new Map<string, CanonicalTemplate[]>();
  let untitled = 0;
  for (const record of records) {
    const title = typeof record.title === 'string' ? record.title.trim() : '';
    if (!title) {
      untitled += 1;
      continue;
    }
    const group = groups.get(title);
    if (group) group.push(record);
    else groups.set(title, [record]);
  }
  return { groups, untitled };
};

/**
 * Resolves records sharing a title. Each record is compared against the
 * survivors so far, and only the first survivor at or above the threshold
 * decides its fate:
 * - same architecture: the higher quality score keeps the slot;
 * - different architecture: both become variants titled `{title}-{arch}`.
 *
 * The variants map is first-write-wins per architecture, so a later record
 * whose architecture is already taken is dropped.
 */
export const resolveDuplicateGroup = (
  title: string,
  group: CanonicalTemplate[],
  options: DeduplicationOptions = {},
): { templates: CanonicalTemplate[]; duplicates: DuplicateRecord[] } => {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const splitVariants = options.autoDetectArchitecture ?? true;
  const unique: CanonicalTemplate[] = [];
  const variants = new Map<string, CanonicalTemplate>();
  const duplicates: DuplicateRecord[] = [];

  for (const template of group) {
    const arch = detectArchitecture(template);
    let matched = false;

    for (let idx = 0; idx < unique.length; idx += 1) {
      const existing = unique[idx];
      const similarity = calculateSimilarity(template, existing);
      if (similarity < threshold) continue;

      matched = true;
      const existingArch = detectArchitecture(existing);
      if (splitVariants && existingArch !== arch) {
        if (!variants.has(arch)) variants.set(arch, template);
        if (!variants.has(existingArch)) variants.set(existingArch, existing);
        if (variants.get(arch) !== template) {
          duplicates.push({ template, title, reason: 'variant-collision', similarity });
        }
      } else if (isBetterTemplate(template, existing)) {
        unique[idx] = template;
        duplicates.push({ template: existing, title, reason: 'superseded', similarity });
      } else {
        duplicates.push({ template, title, reason: 'similarity', similarity });
      }
      break;
    }

    if (!matched) unique.push(template);
  }

  const templates: CanonicalTemplate[] = [];
  for (const [arch, template] of variants) {
    templates.push({ ...stripSource(template), title: `${title}-${arch}` });
  }
  const variantRecords = new Set(variants.values());
  for (const template of unique) {
    if (!variantRecords.has(template)) templates.push(stripSource(template));
  }

  return { templates, duplicates };
};

export const deduplicateTemplates = (
  records: CanonicalTemplate[],
  options: DeduplicationOptions = {},
): DeduplicationResult => {
  const { groups, untitled } = groupByTitle(records);
  const templates: CanonicalTemplate[] = [];
  const duplicates: DuplicateRecord[] = [];

  for (const [title, group] of groups) {
    if (group.length === 1) {
      templates.push(stripSource(group[0]));
      continue;
    }
    const resolved = resolveDuplicateGroup(title, group, options);
    templates.push(...resolved.templates);
    duplicates.push(...resolved.duplicates);
  }

  return { templates, duplicates, untitled };
};
