import type { TemplateCollection } from './types';

export interface SavedCatalog {
  path: string;
  count: number;
}

export interface CatalogStore {
  ensureLayout: () => Promise<void>;
  saveCollection: (collection: TemplateCollection, filename: string) => Promise<SavedCatalog>;
}
