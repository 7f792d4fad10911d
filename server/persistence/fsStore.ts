import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { CatalogStore, SavedCatalog } from '../../shared/artifacts';
import type { TemplateCollection } from '../../shared/types';
import { EmptyCatalogError, OutputPathError } from '../catalog/errors';

export const ensureJsonExtension = (filename: string): string =>
  filename.toLowerCase().endsWith('.json') ? filename : `${filename}.json`;

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new OutputPathError(target);
  }
};

/** Two-space JSON with non-ASCII text written as-is, plus a trailing newline. */
export const serializeCollection = (collection: TemplateCollection): string =>
  `${JSON.stringify(collection, null, 2)}\n`;

export const createFsCatalogStore = (config: Pick<AppConfig, 'persistence'>): CatalogStore => {
  const root = path.resolve(config.persistence.outputDir);

  const ensureLayout = async () => {
    await fs.mkdir(root, { recursive: true });
  };

  const saveCollection = async (collection: TemplateCollection, filename: string): Promise<SavedCatalog> => {
    if (!collection.templates.length) {
      throw new EmptyCatalogError();
    }
    const target = path.resolve(root, ensureJsonExtension(filename.trim()));
    guardPath(root, target);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, serializeCollection(collection), 'utf-8');
    return { path: target, count: collection.templates.length };
  };

  return {
    ensureLayout,
    saveCollection,
  };
};
