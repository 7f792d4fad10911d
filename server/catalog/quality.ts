import type { CanonicalTemplate } from '../../shared/types';

const count = (value: unknown[] | undefined): number => value?.length ?? 0;

/**
 * Completeness score used to break ties between same-architecture duplicates.
 * Unbounded in both directions; only the ordering matters.
 */
export const scoreTemplate = (template: CanonicalTemplate): number => {
  let score = 0;

  if (template.title) score += 10;
  if (template.description) score += 8;
  if (template.image) score += 10;

  if (count(template.categories)) score += 5;
  if (template.platform) score += 3;
  if (template.logo) score += 2;
  score += count(template.env);
  score += count(template.ports) * 2;
  score += count(template.volumes) * 2;

  if (template.repository?.stackfile) score += 15;
  if (template.repository?.url) score += 5;

  if (!template.image) score -= 20;
  if (!template.description) score -= 10;

  return score;
};

/** Strictly greater only; an equal score keeps the incumbent. */
export const isBetterTemplate = (candidate: CanonicalTemplate, incumbent: CanonicalTemplate): boolean =>
  scoreTemplate(candidate) > scoreTemplate(incumbent);

/** Catalog ordering score. Env, port and volume points cap at 10 each; never negative. */
export const rankTemplateQuality = (template: CanonicalTemplate): number => {
  let score = 0;

  if (template.title) score += 20;
  if (template.description) score += 15;
  if (template.image) score += 25;
  if (template.logo) score += 5;
  if (count(template.categories)) score += 5;
  if (template.platform) score += 3;

  score += Math.min(count(template.env), 10);
  score += Math.min(count(template.ports) * 2, 10);
  score += Math.min(count(template.volumes) * 2, 10);

  if (template.repository?.stackfile) score += 20;
  if (template.repository?.url) score += 5;

  if (!template.image) score -= 30;
  if (!template.title) score -= 20;

  return Math.max(score, 0);
};
