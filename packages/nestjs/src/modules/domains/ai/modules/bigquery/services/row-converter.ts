import type { TableFieldSchema, TableRow } from "./bigquery.types";

function isTableRow(value: unknown): value is TableRow {
  return (
    typeof value === "object" &&
    value !== null &&
    "f" in value &&
    Array.isArray(value.f)
  );
}

function cellValue(cell: unknown): unknown {
  return typeof cell === "object" && cell !== null && "v" in cell
    ? cell.v
    : null;
}

function convertScalar(field: TableFieldSchema, value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (field.fields && isTableRow(value)) {
    return convertRow(field.fields, value);
  }
  if (typeof value !== "string") {
    return value;
  }

  switch (field.type) {
    case "INTEGER":
    case "INT64": {
      const parsed = Number(value);
      // keep the exact text when a number would lose precision
      return Number.isSafeInteger(parsed) ? parsed : value;
    }
    case "FLOAT":
    case "FLOAT64":
      return Number(value);
    case "BOOLEAN":
    case "BOOL":
      return value === "true";
    default:
      return value;
  }
}

/**
 * Turns the positional `f`/`v` row encoding into an object keyed by column.
 */
export function convertRow(
  fields: TableFieldSchema[],
  row: TableRow,
): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  fields.forEach((field, index) => {
    const value = cellValue(row.f[index]);
    converted[field.name] =
      field.mode === "REPEATED" && Array.isArray(value)
        ? value.map((item) => convertScalar(field, cellValue(item)))
        : convertScalar(field, value);
  });
  return converted;
}
