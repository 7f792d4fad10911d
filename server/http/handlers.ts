import { z } from 'zod';
import type { CatalogStore, SavedCatalog } from '../../shared/artifacts';
import type { CanonicalTemplate, FormatTag } from '../../shared/types';
import { convertToCanonical, type ConvertedDocument } from '../catalog/converter';
import { EmptyCatalogError, OutputPathError, err, errorMessage, ok, type Result } from '../catalog/errors';
import { sanitizeTemplate } from '../catalog/validation';
import { isRecord } from '../utils/records';

export interface HandlerFailure {
  status: number;
  body: { error: string; format?: FormatTag; problems?: string[] };
}

export type HandlerResult<T> = Result<T, HandlerFailure>;

const badRequest = (error: string, problems?: string[]): HandlerFailure => ({
  status: 400,
  body: problems ? { error, problems } : { error },
});

/** `POST /api/convert`. An unclassifiable or malformed document is a 422. */
export const handleConvert = (body: unknown): HandlerResult<ConvertedDocument> => {
  if (!isRecord(body) || !('document' in body)) {
    return err(badRequest('Missing document'));
  }
  const converted = convertToCanonical(body.document);
  if (!converted.ok) {
    return err({ status: 422, body: { error: converted.error.message, format: converted.error.format } });
  }
  return ok(converted.value);
};

const SaveRequestSchema = z.object({
  collection: z.object({
    templates: z.array(z.unknown()),
  }),
  filename: z.string().trim().min(1).optional(),
});

// Every record is cleaned down to the standard fields; all rejects are reported together.
const sanitizeAll = (templates: unknown[]): Result<CanonicalTemplate[], string[]> => {
  const cleaned: CanonicalTemplate[] = [];
  const problems: string[] = [];
  templates.forEach((template, index) => {
    try {
      cleaned.push(sanitizeTemplate(template));
    } catch (error) {
      problems.push(`collection.templates.${index}: ${errorMessage(error)}`);
    }
  });
  return problems.length ? err(problems) : ok(cleaned);
};

/** `POST /api/catalog/save`. Saving nothing is a validation failure, not an error. */
export const handleSaveCatalog = async (
  body: unknown,
  store: CatalogStore,
  defaultFilename: string,
): Promise<HandlerResult<SavedCatalog>> => {
  const parsed = SaveRequestSchema.safeParse(body);
  if (!parsed.success) {
    return err(
      badRequest(
        'Invalid save request',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      ),
    );
  }

  const templates = sanitizeAll(parsed.data.collection.templates);
  if (!templates.ok) {
    return err(badRequest('Invalid templates', templates.error));
  }

  try {
    const saved = await store.saveCollection(
      { version: '2', templates: templates.value },
      parsed.data.filename ?? defaultFilename,
    );
    return ok(saved);
  } catch (error) {
    if (error instanceof EmptyCatalogError || error instanceof OutputPathError) {
      return err(badRequest(error.message));
    }
    throw error;
  }
};
