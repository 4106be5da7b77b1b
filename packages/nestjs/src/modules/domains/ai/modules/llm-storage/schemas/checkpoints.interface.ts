import type { CheckpointMetadata } from "@langchain/langgraph";

/** One stored checkpoint, without its channel values */
export interface CheckpointRecord {
  threadId: string;
  checkpointNs: string;
  checkpointId: string;
  checkpointType: string;
  checkpointData: Uint8Array;
  metadataType: string;
  metadataData: Uint8Array;
  parentCheckpointId: string | null;
}

export type RecordLookup =
  | { found: true; record: CheckpointRecord }
  | { found: false };

export interface ListedCheckpointRecord {
  record: CheckpointRecord;
  metadata: CheckpointMetadata;
}

export interface CheckpointRecordListOptions {
  /** Omitted means a scan across every thread */
  threadId?: string;
  checkpointNs?: string;
  checkpointId?: string;
  direction?: "ASCENDING" | "DESCENDING";
  /** Exclusive upper bound on the checkpoint id */
  before?: string;
  /** Metadata entries that must all match, compared by deep equality */
  filter?: Record<string, unknown>;
  limit?: number;
}

/** The blob type of a channel that was versioned without a value */
export const EMPTY_BLOB_TYPE = "empty";

// Stored field names, one flat map per document
export const THREAD_ID_FIELD = "thread_id";
export const CHECKPOINT_NS_FIELD = "checkpoint_ns";

export const CheckpointFields = {
  THREAD_ID: THREAD_ID_FIELD,
  CHECKPOINT_NS: CHECKPOINT_NS_FIELD,
  CHECKPOINT_ID: "checkpoint_id",
  CHECKPOINT_TYPE: "checkpoint_type",
  CHECKPOINT_DATA: "checkpoint_data",
  METADATA_TYPE: "metadata_type",
  METADATA_DATA: "metadata_data",
  PARENT_CHECKPOINT_ID: "parent_checkpoint_id",
} as const;

export const BlobFields = {
  THREAD_ID: THREAD_ID_FIELD,
  CHECKPOINT_NS: CHECKPOINT_NS_FIELD,
  CHANNEL: "channel",
  VERSION: "version",
  BLOB_TYPE: "blob_type",
  BLOB_DATA: "blob_data",
} as const;

export const WriteFields = {
  THREAD_ID: THREAD_ID_FIELD,
  CHECKPOINT_NS: CHECKPOINT_NS_FIELD,
  CHECKPOINT_ID: "checkpoint_id",
  TASK_ID: "task_id",
  TASK_PATH: "task_path",
  IDX: "idx",
  CHANNEL: "channel",
  VALUE_TYPE: "value_type",
  VALUE_DATA: "value_data",
} as const;
