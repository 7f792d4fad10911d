import type { FetchErrorKind, FormatTag } from '../../shared/types';

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export class ConversionError extends Error {
  readonly format: FormatTag;

  constructor(message: string, format: FormatTag) {
    super(message);
    this.name = 'ConversionError';
    this.format = format;
  }
}

/** The detector could not classify the document, so there is nothing to convert. */
export class DetectionUnknownError extends ConversionError {
  constructor(message = 'Unsupported template format: unknown') {
    super(message, 'unknown');
    this.name = 'DetectionUnknownError';
  }
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly sourceId: string;

  constructor(kind: FetchErrorKind, sourceId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
    this.sourceId = sourceId;
  }
}

export class EmptyCatalogError extends Error {
  constructor(message = 'No template generated yet. Generate a catalog before saving.') {
    super(message);
    this.name = 'EmptyCatalogError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class OutputPathError extends Error {
  constructor(target: string) {
    super(`Attempted to write outside of output directory: ${target}`);
    this.name = 'OutputPathError';
  }
}
