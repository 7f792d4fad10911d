import type { CanonicalTemplate, FormatTag, TemplateCollection } from '../../shared/types';
import { convertComposeDocument } from './converters/compose';
import { convertQnapTemplate } from './converters/qnap';
import { ConversionError, DetectionUnknownError, err, ok, type Result } from './errors';
import { detectFormat } from './formatDetector';
import { coerceTemplate } from './validation';
import { isRecord } from '../utils/records';

const wrap = (templates: CanonicalTemplate[]): TemplateCollection => ({ version: '2', templates });

// Entries that are not objects cannot be templates; they are skipped rather than failing the document.
const readRecords = (entries: unknown[], convert: (entry: Record<string, unknown>) => CanonicalTemplate) =>
  entries.filter(isRecord).map(convert);

/**
 * Converts a document already classified as `format` into a canonical
 * collection. Portainer shapes pass through `coerceTemplate`, so unknown
 * fields survive and the legacy env `value` key becomes `default`.
 */
export const convertDocument = (
  doc: unknown,
  format: FormatTag,
): Result<TemplateCollection, ConversionError> => {
  switch (format) {
    case 'portainer':
      if (!isRecord(doc) || !Array.isArray(doc.templates)) {
        return err(new ConversionError('Portainer document has no templates list', format));
      }
      return ok(wrap(readRecords(doc.templates, coerceTemplate)));
    case 'portainer_single':
      if (!isRecord(doc)) return err(new ConversionError('Portainer template must be an object', format));
      return ok(wrap([coerceTemplate(doc)]));
    case 'portainer_array':
      if (!Array.isArray(doc)) return err(new ConversionError('Portainer template list must be an array', format));
      return ok(wrap(readRecords(doc, coerceTemplate)));
    case 'qnap_single':
      if (!isRecord(doc)) return err(new ConversionError('QNAP template must be an object', format));
      return ok(wrap([convertQnapTemplate(doc)]));
    case 'qnap_array':
      if (!Array.isArray(doc)) return err(new ConversionError('QNAP template list must be an array', format));
      return ok(wrap(readRecords(doc, convertQnapTemplate)));
    case 'docker_compose':
      return convertComposeDocument(doc);
    case 'unknown':
      return err(new DetectionUnknownError());
  }
};

export interface ConvertedDocument {
  format: FormatTag;
  collection: TemplateCollection;
}

export const convertToCanonical = (doc: unknown): Result<ConvertedDocument, ConversionError> => {
  const format = detectFormat(doc);
  const converted = convertDocument(doc, format);
  if (!converted.ok) return converted;
  return ok({ format, collection: converted.value });
};
