import type { CheckpointMetadata } from "@langchain/langgraph";
import type { SerializerProtocol } from "@langchain/langgraph-checkpoint";
import { isDeepStrictEqual } from "node:util";

import {
  readBytes,
  readOptionalString,
  readString,
} from "../codec/document-fields";
import { checkpointKey } from "../keys/document-keys";
import type {
  DocumentStorePort,
  StoredDocument,
} from "../ports/document-store.port";
import {
  CheckpointFields,
  type CheckpointRecord,
  type CheckpointRecordListOptions,
  type ListedCheckpointRecord,
  type RecordLookup,
} from "../schemas/checkpoints.interface";
import { ThreadScopedStore } from "./thread-scoped.store";

function toRecord({ id, fields }: StoredDocument): CheckpointRecord {
  return {
    threadId: readString(id, fields, CheckpointFields.THREAD_ID),
    checkpointNs: readString(id, fields, CheckpointFields.CHECKPOINT_NS),
    checkpointId: readString(id, fields, CheckpointFields.CHECKPOINT_ID),
    checkpointType: readString(id, fields, CheckpointFields.CHECKPOINT_TYPE),
    checkpointData: readBytes(id, fields, CheckpointFields.CHECKPOINT_DATA),
    metadataType: readString(id, fields, CheckpointFields.METADATA_TYPE),
    metadataData: readBytes(id, fields, CheckpointFields.METADATA_DATA),
    parentCheckpointId:
      readOptionalString(fields, CheckpointFields.PARENT_CHECKPOINT_ID) ??
      null,
  };
}

function matchesFilter(
  metadata: unknown,
  filter: Record<string, unknown>,
): boolean {
  if (typeof metadata !== "object" || metadata === null) {
    return Object.keys(filter).length === 0;
  }
  const entries = new Map(Object.entries(metadata));
  return Object.entries(filter).every(
    ([key, expected]) =>
      entries.has(key) && isDeepStrictEqual(entries.get(key), expected),
  );
}

/**
 * Checkpoint bodies and metadata, one document per checkpoint id.
 */
export class CheckpointRecordStore extends ThreadScopedStore {
  constructor(
    store: DocumentStorePort,
    collection: string,
    private readonly serde: SerializerProtocol,
  ) {
    super(store, collection);
  }

  /** The channel blobs the record refers to must already be stored */
  async put(record: CheckpointRecord): Promise<void> {
    await this.store.upsert(
      this.collection,
      checkpointKey(record.threadId, record.checkpointNs, record.checkpointId),
      {
        [CheckpointFields.THREAD_ID]: record.threadId,
        [CheckpointFields.CHECKPOINT_NS]: record.checkpointNs,
        [CheckpointFields.CHECKPOINT_ID]: record.checkpointId,
        [CheckpointFields.CHECKPOINT_TYPE]: record.checkpointType,
        [CheckpointFields.CHECKPOINT_DATA]: record.checkpointData,
        [CheckpointFields.METADATA_TYPE]: record.metadataType,
        [CheckpointFields.METADATA_DATA]: record.metadataData,
        [CheckpointFields.PARENT_CHECKPOINT_ID]: record.parentCheckpointId,
      },
    );
  }

  async getExact(
    threadId: string,
    checkpointNs: string,
    checkpointId: string,
  ): Promise<RecordLookup> {
    const lookup = await this.store.get(
      this.collection,
      checkpointKey(threadId, checkpointNs, checkpointId),
    );
    if (!lookup.found) {
      return { found: false };
    }

    // Distinct (thread, namespace) pairs can share a document id, e.g.
    // ("a__", "b") and ("a", "__b"); the stored fields settle ownership
    const record = toRecord(lookup.document);
    if (record.threadId !== threadId || record.checkpointNs !== checkpointNs) {
      return { found: false };
    }
    return { found: true, record };
  }

  async getLatest(
    threadId: string,
    checkpointNs: string,
  ): Promise<RecordLookup> {
    const [latest] = await this.store.query(this.collection, {
      where: {
        [CheckpointFields.THREAD_ID]: threadId,
        [CheckpointFields.CHECKPOINT_NS]: checkpointNs,
      },
      orderBy: CheckpointFields.CHECKPOINT_ID,
      direction: "DESCENDING",
      limit: 1,
    });
    if (!latest) {
      return { found: false };
    }
    return { found: true, record: toRecord(latest) };
  }

  /**
   * Yields records in checkpoint id order with their decoded metadata.
   * `limit` counts records after `before` and `filter` are applied.
   */
  async *list({
    threadId,
    checkpointNs,
    checkpointId,
    direction = "DESCENDING",
    before,
    filter,
    limit,
  }: CheckpointRecordListOptions = {}): AsyncGenerator<ListedCheckpointRecord> {
    if (limit !== undefined && limit <= 0) {
      return;
    }

    const where: Record<string, string> = {};
    if (threadId !== undefined) {
      where[CheckpointFields.THREAD_ID] = threadId;
    }
    if (checkpointNs !== undefined) {
      where[CheckpointFields.CHECKPOINT_NS] = checkpointNs;
    }
    if (checkpointId !== undefined) {
      where[CheckpointFields.CHECKPOINT_ID] = checkpointId;
    }

    const documents = await this.store.query(this.collection, {
      where,
      orderBy: CheckpointFields.CHECKPOINT_ID,
      direction,
    });

    let yielded = 0;
    for (const document of documents) {
      const record = toRecord(document);
      if (before !== undefined && record.checkpointId >= before) {
        continue;
      }

      const metadata: CheckpointMetadata = await this.serde.loadsTyped(
        record.metadataType,
        record.metadataData,
      );
      if (filter && !matchesFilter(metadata, filter)) {
        continue;
      }

      yield { record, metadata };
      yielded += 1;
      if (limit !== undefined && yielded >= limit) {
        return;
      }
    }
  }
}
