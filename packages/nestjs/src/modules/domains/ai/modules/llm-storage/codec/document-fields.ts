import type { DocumentFields } from "./firestore-value.codec";

export class MalformedDocumentError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly field: string,
    expected: string,
  ) {
    super(`Document "${documentId}" has no ${expected} field "${field}"`);
    this.name = MalformedDocumentError.name;
  }
}

export function readString(
  id: string,
  fields: DocumentFields,
  field: string,
): string {
  const value = fields[field];
  if (typeof value !== "string") {
    throw new MalformedDocumentError(id, field, "string");
  }
  return value;
}

export function readOptionalString(
  fields: DocumentFields,
  field: string,
): string | undefined {
  const value = fields[field];
  return typeof value === "string" ? value : undefined;
}

export function readBytes(
  id: string,
  fields: DocumentFields,
  field: string,
): Uint8Array {
  const value = fields[field];
  if (!(value instanceof Uint8Array)) {
    throw new MalformedDocumentError(id, field, "bytes");
  }
  return value;
}
