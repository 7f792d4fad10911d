import { describe, expect, it } from 'vitest';
import { decodeDocument, syntaxForPath } from '../decode';

describe('syntaxForPath', () => {
  it('picks YAML by extension only', () => {
    expect(syntaxForPath('/srv/docker-compose.yml')).toBe('yaml');
    expect(syntaxForPath('C:\\stacks\\app.YAML')).toBe('yaml');
    expect(syntaxForPath('/templates.json')).toBe('json');
    expect(syntaxForPath('/templates')).toBe('json');
  });
});

describe('decodeDocument', () => {
  it('ignores a leading byte order mark', () => {
    expect(decodeDocument('\uFEFF{"version": "2"}', 'json')).toEqual({ version: '2' });
  });

  it('accepts comments and trailing commas in JSON', () => {
    expect(decodeDocument('{ /* hand edited */ "templates": [1, 2,], }', 'json')).toEqual({ templates: [1, 2] });
  });

  it('parses YAML mappings', () => {
    expect(decodeDocument('services:\n  web:\n    ports:\n      - "8080:80"\n', 'yaml')).toEqual({
      services: { web: { ports: ['8080:80'] } },
    });
  });

  it('throws on malformed JSON', () => {
    expect(() => decodeDocument('{"a": ', 'json')).toThrow();
  });
});
