import { z } from 'zod';
import type { MergeSettings } from '../../shared/config';
import type { CanonicalTemplate } from '../../shared/types';
import { err, ok, type Result } from '../catalog/errors';
import { BASE_TEMPLATE_PREFIX } from '../catalog/summary';
import { validateManualTemplate } from '../catalog/validation';

const MergeRequestSchema = z.object({
  sources: z.array(z.string().trim().min(1, 'Source must not be empty')).optional(),
  manual: z.array(z.unknown()).optional(),
  includeBaseTemplate: z.boolean().optional(),
});

export interface MergeRequest {
  sources: string[];
  manual: CanonicalTemplate[];
  includeBaseTemplate?: boolean;
}

/** Every manual record is validated; problems from all of them are reported together. */
export const parseMergeRequest = (body: unknown): Result<MergeRequest, string[]> => {
  const parsed = MergeRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`));
  }

  const problems: string[] = [];
  const manual: CanonicalTemplate[] = [];
  (parsed.data.manual ?? []).forEach((entry, index) => {
    const validated = validateManualTemplate(entry);
    if (validated.ok) {
      manual.push(validated.value);
    } else {
      problems.push(...validated.error.map((problem) => `manual.${index}.${problem}`));
    }
  });
  if (problems.length) return err(problems);

  return ok({
    sources: parsed.data.sources ?? [],
    manual,
    includeBaseTemplate: parsed.data.includeBaseTemplate,
  });
};

/**
 * Source ids in load order: the base template (when enabled by the request
 * or, failing that, by settings), then the requested sources, or the
 * configured defaults when none were requested. Repeats are dropped.
 */
export const resolveSourceIds = (request: MergeRequest, settings: MergeSettings): string[] => {
  const ids: string[] = [];
  const includeBase = request.includeBaseTemplate ?? settings.baseTemplate.enabled;
  const baseUrl = settings.baseTemplate.url.trim();
  if (includeBase && baseUrl) {
    ids.push(`${BASE_TEMPLATE_PREFIX}${baseUrl}`);
  }

  const requested = request.sources.length
    ? request.sources
    : [...settings.defaultSources.urls, ...settings.defaultSources.files];
  ids.push(...requested.map((id) => id.trim()).filter(Boolean));

  return [...new Set(ids)];
};
