import type { ChannelVersions, SerializerProtocol } from "@langchain/langgraph-checkpoint";

import { readBytes, readOptionalString } from "../codec/document-fields";
import { blobKey } from "../keys/document-keys";
import type { DocumentStorePort } from "../ports/document-store.port";
import { BlobFields, EMPTY_BLOB_TYPE } from "../schemas/checkpoints.interface";
import { ThreadScopedStore } from "./thread-scoped.store";

/**
 * Channel values, stored once per (thread, namespace, channel, version).
 */
export class ChannelBlobStore extends ThreadScopedStore {
  constructor(
    store: DocumentStorePort,
    collection: string,
    private readonly serde: SerializerProtocol,
  ) {
    super(store, collection);
  }

  async put(
    threadId: string,
    checkpointNs: string,
    channel: string,
    version: string | number,
    blobType: string,
    blobData: Uint8Array,
  ): Promise<void> {
    // Same key, same content: rewriting is harmless
    await this.store.upsert(
      this.collection,
      blobKey(threadId, checkpointNs, channel, version),
      {
        [BlobFields.THREAD_ID]: threadId,
        [BlobFields.CHECKPOINT_NS]: checkpointNs,
        [BlobFields.CHANNEL]: channel,
        [BlobFields.VERSION]: String(version),
        [BlobFields.BLOB_TYPE]: blobType,
        [BlobFields.BLOB_DATA]: blobData,
      },
    );
  }

  /**
   * Loads the value of every channel at the given version. Channels without a
   * stored blob, or whose blob is the empty sentinel, are left out.
   */
  async loadAll(
    threadId: string,
    checkpointNs: string,
    channelVersions: ChannelVersions,
  ): Promise<Record<string, unknown>> {
    const entries = await Promise.all(
      Object.entries(channelVersions).map(async ([channel, version]) => {
        const lookup = await this.store.get(
          this.collection,
          blobKey(threadId, checkpointNs, channel, version),
        );
        if (!lookup.found) {
          return undefined;
        }

        const { id, fields } = lookup.document;
        if (
          readOptionalString(fields, BlobFields.THREAD_ID) !== threadId ||
          readOptionalString(fields, BlobFields.CHECKPOINT_NS) !==
            checkpointNs ||
          readOptionalString(fields, BlobFields.CHANNEL) !== channel ||
          readOptionalString(fields, BlobFields.VERSION) !== String(version)
        ) {
          // a colliding key written for another thread, namespace or channel
          return undefined;
        }

        const blobType = readOptionalString(fields, BlobFields.BLOB_TYPE);
        if (blobType === undefined || blobType === EMPTY_BLOB_TYPE) {
          return undefined;
        }

        const value: unknown = await this.serde.loadsTyped(
          blobType,
          readBytes(id, fields, BlobFields.BLOB_DATA),
        );
        return [channel, value] as const;
      }),
    );

    const values: Record<string, unknown> = {};
    for (const entry of entries) {
      if (entry) {
        values[entry[0]] = entry[1];
      }
    }
    return values;
  }
}
