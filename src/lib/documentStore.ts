export type CollectionName = 'product' | 'order' | 'lead';

/**
 * A document as handed back by the store: its id rendered as a string,
 * timestamps as ISO-8601 strings and everything else untyped until a model
 * parses it.
 */
export interface StoredDocument {
  id: string;
  [field: string]: unknown;
}

/**
 * Equality filter. Keys may be dotted paths (`download_links.token`), which
 * match when any element of an embedded array carries the value.
 */
export type DocumentFilter = Record<string, string | number | boolean>;

export interface StoreInfo {
  name: string;
  collections: string[];
}

/**
 * Minimal handle onto the document database. Services receive one of these
 * rather than reaching for a connection singleton.
 */
export interface DocumentStore {
  /** Inserts `data`, stamping `created_at` and `updated_at`; resolves to the new id. */
  create(collection: CollectionName, data: object): Promise<string>;
  find(collection: CollectionName, filter?: DocumentFilter, limit?: number): Promise<StoredDocument[]>;
  /** Resolves to null for unknown ids and for strings that are not valid ids. */
  findById(collection: CollectionName, id: string): Promise<StoredDocument | null>;
  describe(): Promise<StoreInfo>;
}

export const currentTimestamp = (): string => new Date().toISOString();
