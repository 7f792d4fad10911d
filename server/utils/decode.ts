import yaml from 'js-yaml';
import JSON5 from 'json5';

export type DocumentSyntax = 'json' | 'yaml';

const YAML_EXTENSION = /\.ya?ml$/i;

/** `.yml` / `.yaml` means YAML; anything else is read as JSON. */
export const syntaxForPath = (pathname: string): DocumentSyntax =>
  YAML_EXTENSION.test(pathname) ? 'yaml' : 'json';

/**
 * JSON goes through JSON5 so hand-edited catalogs with comments or trailing
 * commas still load. Throws on malformed input.
 */
export const decodeDocument = (text: string, syntax: DocumentSyntax): unknown => {
  const body = text.replace(/^\uFEFF/, '');
  if (syntax === 'yaml') {
    return yaml.load(body);
  }
  const parsed: unknown = JSON5.parse(body);
  return parsed;
};
