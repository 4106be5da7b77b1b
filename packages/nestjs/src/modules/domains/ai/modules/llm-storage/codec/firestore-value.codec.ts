/**
 * Encoding between plain field values and the typed value objects of the
 * Firestore REST API (`projects.databases.documents`).
 *
 * Only the six scalar kinds used by the checkpoint collections are supported.
 */

export type FieldValue = null | boolean | number | bigint | Uint8Array | string;

export type DocumentFields = Record<string, FieldValue>;

export type FirestoreValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number }
  | { bytesValue: string }
  | { stringValue: string };

export type FirestoreFields = Record<string, FirestoreValue>;

export class UnsupportedFieldValueError extends Error {
  constructor(
    public readonly field: string | undefined,
    public readonly valueType: string,
  ) {
    super(
      field === undefined
        ? `Unsupported field value of type "${valueType}"`
        : `Unsupported value of type "${valueType}" for field "${field}"`,
    );
    this.name = UnsupportedFieldValueError.name;
  }
}

export function encodeValue(value: unknown, field?: string): FirestoreValue {
  if (value === null) {
    return { nullValue: null };
  }
  if (typeof value === "boolean") {
    return { booleanValue: value };
  }
  if (typeof value === "bigint") {
    return { integerValue: value.toString() };
  }
  if (typeof value === "number") {
    return Number.isInteger(value)
      ? { integerValue: BigInt(value).toString() }
      : { doubleValue: value };
  }
  if (typeof value === "string") {
    return { stringValue: value };
  }
  if (value instanceof Uint8Array) {
    return { bytesValue: Buffer.from(value).toString("base64") };
  }

  throw new UnsupportedFieldValueError(
    field,
    Array.isArray(value) ? "array" : typeof value,
  );
}

/**
 * Decodes a REST value object. Kinds outside the supported six (maps, arrays,
 * timestamps, references...) decode to `null`.
 */
export function decodeValue(value: unknown): FieldValue {
  if (typeof value !== "object" || value === null) {
    return null;
  }

  if ("booleanValue" in value && typeof value.booleanValue === "boolean") {
    return value.booleanValue;
  }
  if ("integerValue" in value) {
    const raw = value.integerValue;
    if (typeof raw !== "string" && typeof raw !== "number") {
      return null;
    }
    const parsed = BigInt(raw);
    return parsed >= BigInt(Number.MIN_SAFE_INTEGER) &&
      parsed <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(parsed)
      : parsed;
  }
  if ("doubleValue" in value) {
    const raw = value.doubleValue;
    // NaN and the infinities arrive as strings
    if (typeof raw === "number") return raw;
    if (typeof raw === "string") return Number(raw);
    return null;
  }
  if ("bytesValue" in value && typeof value.bytesValue === "string") {
    return new Uint8Array(Buffer.from(value.bytesValue, "base64"));
  }
  if ("stringValue" in value && typeof value.stringValue === "string") {
    return value.stringValue;
  }

  return null;
}

export function encodeFields(fields: DocumentFields): FirestoreFields {
  const encoded: FirestoreFields = {};
  for (const [name, value] of Object.entries(fields)) {
    encoded[name] = encodeValue(value, name);
  }
  return encoded;
}

export function decodeFields(fields: unknown): DocumentFields {
  const decoded: DocumentFields = {};
  if (typeof fields !== "object" || fields === null) {
    return decoded;
  }
  for (const [name, value] of Object.entries(fields)) {
    decoded[name] = decodeValue(value);
  }
  return decoded;
}
