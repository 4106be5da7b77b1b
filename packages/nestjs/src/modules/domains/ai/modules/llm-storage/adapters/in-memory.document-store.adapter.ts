import { Injectable, Logger } from "@nestjs/common";

import type {
  DocumentFields,
  FieldValue,
} from "../codec/firestore-value.codec";
import type {
  CreateOutcome,
  DocumentLookup,
  DocumentQuery,
  DocumentStorePort,
  StoredDocument,
} from "../ports/document-store.port";

function copyFields(fields: DocumentFields): DocumentFields {
  const copy: DocumentFields = {};
  for (const [name, value] of Object.entries(fields)) {
    copy[name] = value instanceof Uint8Array ? new Uint8Array(value) : value;
  }
  return copy;
}

function compareFieldValues(a: FieldValue, b: FieldValue): number {
  if (typeof a === "string" && typeof b === "string") {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
  if (
    (typeof a === "number" || typeof a === "bigint") &&
    (typeof b === "number" || typeof b === "bigint")
  ) {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
  return 0;
}

/**
 * Process local document store with Firestore query semantics, used for
 * local development and tests.
 */
@Injectable()
export class InMemoryDocumentStoreAdapter implements DocumentStorePort {
  private readonly logger = new Logger(InMemoryDocumentStoreAdapter.name);

  private readonly collections = new Map<string, Map<string, DocumentFields>>();

  private collection(name: string): Map<string, DocumentFields> {
    let documents = this.collections.get(name);
    if (!documents) {
      documents = new Map();
      this.collections.set(name, documents);
    }
    return documents;
  }

  async get(collection: string, id: string): Promise<DocumentLookup> {
    const fields = this.collection(collection).get(id);
    if (!fields) {
      return { found: false };
    }
    return { found: true, document: { id, fields: copyFields(fields) } };
  }

  async query(
    collection: string,
    { where, orderBy, direction = "ASCENDING", limit }: DocumentQuery,
  ): Promise<StoredDocument[]> {
    const filters = Object.entries(where);

    let matches: StoredDocument[] = [];
    for (const [id, fields] of this.collection(collection)) {
      if (filters.every(([name, expected]) => fields[name] === expected)) {
        matches.push({ id, fields: copyFields(fields) });
      }
    }

    if (orderBy) {
      const sign = direction === "DESCENDING" ? -1 : 1;
      matches = matches
        .filter(({ fields }) => orderBy in fields)
        .sort(
          (a, b) =>
            sign * compareFieldValues(a.fields[orderBy], b.fields[orderBy]),
        );
    }

    if (limit !== undefined) {
      matches = matches.slice(0, limit);
    }

    this.logger.verbose(
      `Query on ${collection} matched ${matches.length} documents`,
    );
    return matches;
  }

  async upsert(
    collection: string,
    id: string,
    fields: DocumentFields,
  ): Promise<void> {
    this.collection(collection).set(id, copyFields(fields));
  }

  async create(
    collection: string,
    id: string,
    fields: DocumentFields,
  ): Promise<CreateOutcome> {
    const documents = this.collection(collection);
    if (documents.has(id)) {
      return { created: false, reason: "already-exists" };
    }
    documents.set(id, copyFields(fields));
    return { created: true };
  }

  async delete(collection: string, id: string): Promise<void> {
    this.collection(collection).delete(id);
  }
}
