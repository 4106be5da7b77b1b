/**
 * Interfaces for the subset of the BigQuery REST API v2 used by the analyst
 */

export interface DatasetListResponse {
  datasets?: { datasetReference: { projectId: string; datasetId: string } }[];
  nextPageToken?: string;
}

export interface TableListResponse {
  tables?: {
    tableReference: { projectId: string; datasetId: string; tableId: string };
  }[];
  nextPageToken?: string;
}

export interface TableFieldSchema {
  name: string;
  type: string;
  mode?: "NULLABLE" | "REQUIRED" | "REPEATED";
  fields?: TableFieldSchema[];
}

export interface TableResponse {
  id?: string;
  schema?: { fields?: TableFieldSchema[] };
}

export interface TableCell {
  v: unknown;
}

export interface TableRow {
  f: TableCell[];
}

/**
 * Shared by `jobs.query` and `jobs.getQueryResults`
 */
export interface QueryResponse {
  jobComplete: boolean;
  jobReference?: { projectId: string; jobId: string; location?: string };
  schema?: { fields?: TableFieldSchema[] };
  rows?: TableRow[];
  totalRows?: string;
}

export interface QueryRequest {
  query: string;
  useLegacySql: false;
  maxResults: number;
  timeoutMs: number;
  location: string;
}

export interface ColumnSchema {
  name: string;
  type: string;
  mode: string;
}

export type SqlExecutionResult =
  | {
      success: true;
      rows: Record<string, unknown>[];
      totalRows: number;
      truncated: boolean;
    }
  | {
      success: false;
      error: string;
      /** Set when the statement was refused before reaching BigQuery */
      blockedKeyword?: string;
    };
