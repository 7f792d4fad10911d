import type { FormatTag } from '../../shared/types';
import { hasKey, isRecord, type JsonRecord } from '../utils/records';

const looksLikeCompose = (doc: JsonRecord): boolean => {
  if (isRecord(doc.services)) return true;
  return hasKey(doc, 'version') && ['services', 'networks', 'volumes'].some((key) => hasKey(doc, key));
};

const looksLikeQnap = (doc: JsonRecord): boolean => hasKey(doc, 'displayName') && hasKey(doc, 'name');

const looksLikePortainerTemplate = (doc: JsonRecord): boolean => hasKey(doc, 'title') || hasKey(doc, 'image');

/**
 * Classifies a decoded JSON/YAML document. Objects are checked in precedence
 * order compose → portainer → single template → single QNAP entry; arrays are
 * classified from their first element only.
 */
export const detectFormat = (doc: unknown): FormatTag => {
  if (Array.isArray(doc)) {
    const first: unknown = doc[0];
    if (!isRecord(first)) return 'unknown';
    if (looksLikeQnap(first)) return 'qnap_array';
    if (looksLikePortainerTemplate(first)) return 'portainer_array';
    return 'unknown';
  }

  if (!isRecord(doc)) return 'unknown';

  if (looksLikeCompose(doc)) return 'docker_compose';
  if (Array.isArray(doc.templates) && hasKey(doc, 'version')) return 'portainer';
  if (looksLikePortainerTemplate(doc)) return 'portainer_single';
  if (looksLikeQnap(doc)) return 'qnap_single';
  return 'unknown';
};
