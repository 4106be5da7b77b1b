import { Inject } from "@nestjs/common";

import type { DocumentFields } from "../codec/firestore-value.codec";

export const DOCUMENT_STORE = Symbol("document-store");

export interface StoredDocument {
  id: string;
  fields: DocumentFields;
}

export type DocumentLookup =
  | { found: true; document: StoredDocument }
  | { found: false };

export type CreateOutcome =
  | { created: true }
  | { created: false; reason: "already-exists" };

export type SortDirection = "ASCENDING" | "DESCENDING";

export interface DocumentQuery {
  /** Equality filters, ANDed together */
  where: Record<string, string>;
  orderBy?: string;
  direction?: SortDirection;
  limit?: number;
}

/**
 * Minimal document database surface used by the checkpoint stores.
 */
export interface DocumentStorePort {
  get(collection: string, id: string): Promise<DocumentLookup>;

  query(collection: string, query: DocumentQuery): Promise<StoredDocument[]>;

  /** Replaces the whole document, creating it when missing */
  upsert(collection: string, id: string, fields: DocumentFields): Promise<void>;

  create(
    collection: string,
    id: string,
    fields: DocumentFields,
  ): Promise<CreateOutcome>;

  /** Deleting a missing document is not an error */
  delete(collection: string, id: string): Promise<void>;
}

export const InjectDocumentStore = () => Inject(DOCUMENT_STORE);
