import type { CanonicalTemplate } from '../../shared/types';

const TITLE_PREFIXES = ['docker-', 'container-'];
const TITLE_SUFFIXES = ['-container', '-docker', ' container', ' docker'];

/**
 * Loose comparison key for titles: whitespace collapsed, lower-cased, and at
 * most one known prefix and one known suffix removed.
 */
export const normalizeTemplateTitle = (title: string): string => {
  let normalized = title.trim().split(/\s+/).join(' ').toLowerCase();

  const prefix = TITLE_PREFIXES.find((candidate) => normalized.startsWith(candidate));
  if (prefix) normalized = normalized.slice(prefix.length);

  const suffix = TITLE_SUFFIXES.find((candidate) => normalized.endsWith(candidate));
  if (suffix) normalized = normalized.slice(0, -suffix.length);

  return normalized.trim();
};

/** `ghcr.io/linuxserver/plex:latest` → `plex`. */
export const extractImageName = (image: string): string => {
  const lastSegment = image.split('/').pop() ?? '';
  const [name] = lastSegment.split(':');
  return name.toLowerCase();
};

export interface RelatedTemplates {
  /** `title:<normalized title>` or `image:<image name>`. */
  key: string;
  titles: string[];
}

/**
 * Templates that survived the merge under different titles but share a
 * normalized title or an image name, in first-seen order. Review hint only.
 */
export const findRelatedTemplates = (templates: CanonicalTemplate[]): RelatedTemplates[] => {
  const groups = new Map<string, Set<string>>();
  const add = (key: string, title: string) => {
    const titles = groups.get(key);
    if (titles) titles.add(title);
    else groups.set(key, new Set([title]));
  };

  for (const template of templates) {
    if (!template.title) continue;
    const normalized = normalizeTemplateTitle(template.title);
    if (normalized) add(`title:${normalized}`, template.title);
    const imageName = template.image ? extractImageName(template.image) : '';
    if (imageName) add(`image:${imageName}`, template.title);
  }

  return [...groups]
    .filter(([, titles]) => titles.size > 1)
    .map(([key, titles]) => ({ key, titles: [...titles] }));
};
