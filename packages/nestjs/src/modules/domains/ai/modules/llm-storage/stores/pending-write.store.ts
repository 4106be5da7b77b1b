import {
  type PendingWrite,
  type SerializerProtocol,
  WRITES_IDX_MAP,
} from "@langchain/langgraph-checkpoint";
import { Logger } from "@nestjs/common";

import { readBytes, readString } from "../codec/document-fields";
import { writeKey } from "../keys/document-keys";
import type { DocumentStorePort } from "../ports/document-store.port";
import { WriteFields } from "../schemas/checkpoints.interface";
import { ThreadScopedStore } from "./thread-scoped.store";

/**
 * Task outputs recorded against a checkpoint before the next one is taken.
 */
export class PendingWriteStore extends ThreadScopedStore {
  private readonly logger = new Logger(PendingWriteStore.name);

  constructor(
    store: DocumentStorePort,
    collection: string,
    private readonly serde: SerializerProtocol,
  ) {
    super(store, collection);
  }

  /**
   * Regular writes (slot >= 0) are recorded once and never overwritten, so a
   * retried task cannot replace its earlier output. Special channels map to
   * negative slots and always keep the latest value; they are written one
   * after another in batch order, so the last entry for a slot wins.
   */
  async putMany(
    threadId: string,
    checkpointNs: string,
    checkpointId: string,
    taskId: string,
    taskPath: string,
    writes: PendingWrite[],
  ): Promise<void> {
    const documents = await Promise.all(
      writes.map(async ([channel, value], idx) => {
        const slot = WRITES_IDX_MAP[channel] ?? idx;
        const [valueType, valueData] = await this.serde.dumpsTyped(value);

        return {
          slot,
          id: writeKey(threadId, checkpointNs, checkpointId, taskId, slot),
          fields: {
            [WriteFields.THREAD_ID]: threadId,
            [WriteFields.CHECKPOINT_NS]: checkpointNs,
            [WriteFields.CHECKPOINT_ID]: checkpointId,
            [WriteFields.TASK_ID]: taskId,
            [WriteFields.TASK_PATH]: taskPath,
            [WriteFields.IDX]: slot,
            [WriteFields.CHANNEL]: channel,
            [WriteFields.VALUE_TYPE]: valueType,
            [WriteFields.VALUE_DATA]: valueData,
          },
        };
      }),
    );

    const regular = documents.filter(({ slot }) => slot >= 0);
    const special = documents.filter(({ slot }) => slot < 0);

    await Promise.all(
      regular.map(async ({ id, fields }) => {
        const outcome = await this.store.create(this.collection, id, fields);
        if (!outcome.created) {
          this.logger.debug(`Write ${id} already recorded, keeping the first`);
        }
      }),
    );

    for (const { id, fields } of special) {
      await this.store.upsert(this.collection, id, fields);
    }
  }

  async listForCheckpoint(
    threadId: string,
    checkpointNs: string,
    checkpointId: string,
  ): Promise<[string, string, unknown][]> {
    const documents = await this.store.query(this.collection, {
      where: {
        [WriteFields.THREAD_ID]: threadId,
        [WriteFields.CHECKPOINT_NS]: checkpointNs,
        [WriteFields.CHECKPOINT_ID]: checkpointId,
      },
    });

    return Promise.all(
      documents.map(async ({ id, fields }): Promise<[string, string, unknown]> => {
        const value: unknown = await this.serde.loadsTyped(
          readString(id, fields, WriteFields.VALUE_TYPE),
          readBytes(id, fields, WriteFields.VALUE_DATA),
        );
        return [
          readString(id, fields, WriteFields.TASK_ID),
          readString(id, fields, WriteFields.CHANNEL),
          value,
        ];
      }),
    );
  }
}
