import type { RunnableConfig } from "@langchain/core/runnables";
import {
  BaseCheckpointSaver,
  type Checkpoint,
  type CheckpointMetadata,
  type CheckpointTuple,
} from "@langchain/langgraph";
import {
  type ChannelVersions,
  type CheckpointListOptions,
  copyCheckpoint,
  getCheckpointId,
  type PendingWrite,
} from "@langchain/langgraph-checkpoint";
import { Inject, Injectable, Logger, type OnModuleInit } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import firestoreConfig from "../../../../config-management/configs/firestore.config";
import type { CheckpointerPort } from "./ports/checkpointer.port";
import {
  type DocumentStorePort,
  InjectDocumentStore,
} from "./ports/document-store.port";
import {
  type CheckpointRecord,
  EMPTY_BLOB_TYPE,
} from "./schemas/checkpoints.interface";
import { ChannelBlobStore } from "./stores/channel-blob.store";
import { CheckpointRecordStore } from "./stores/checkpoint-record.store";
import { PendingWriteStore } from "./stores/pending-write.store";

const EMPTY_BLOB: [string, Uint8Array] = [EMPTY_BLOB_TYPE, new Uint8Array(0)];

function readThreadId(config: RunnableConfig): string | undefined {
  const threadId: unknown = config.configurable?.thread_id;
  if (typeof threadId === "number") {
    return String(threadId);
  }
  return typeof threadId === "string" && threadId !== "" ? threadId : undefined;
}

function readCheckpointNs(config: RunnableConfig): string | undefined {
  const checkpointNs: unknown = config.configurable?.checkpoint_ns;
  return typeof checkpointNs === "string" ? checkpointNs : undefined;
}

function readCheckpointId(config: RunnableConfig): string | undefined {
  const checkpointId = getCheckpointId(config);
  return checkpointId ? checkpointId : undefined;
}

function checkpointConfig(
  threadId: string,
  checkpointNs: string,
  checkpointId: string,
): RunnableConfig {
  return {
    configurable: {
      thread_id: threadId,
      checkpoint_ns: checkpointNs,
      checkpoint_id: checkpointId,
    },
  };
}

/**
 * LangGraph checkpointer persisting to Firestore through the document store
 * port. Checkpoint bodies, channel values and pending writes live in three
 * collections, see `schemas/checkpoints.interface.ts`.
 *
 * Assumes a single writer per thread: two concurrent `put` calls with the
 * same parent both succeed and fork the thread's history.
 */
@Injectable()
export class FirestoreCheckpointerAdapter
  extends BaseCheckpointSaver
  implements CheckpointerPort, OnModuleInit
{
  private readonly logger = new Logger(FirestoreCheckpointerAdapter.name);

  public instance!: BaseCheckpointSaver;

  private readonly blobs: ChannelBlobStore;
  private readonly records: CheckpointRecordStore;
  private readonly writes: PendingWriteStore;

  constructor(
    @InjectDocumentStore()
    store: DocumentStorePort,
    @Inject(firestoreConfig.KEY)
    config: ConfigType<typeof firestoreConfig>,
  ) {
    super();
    const { collections } = config;
    this.blobs = new ChannelBlobStore(store, collections.blobs, this.serde);
    this.records = new CheckpointRecordStore(
      store,
      collections.checkpoints,
      this.serde,
    );
    this.writes = new PendingWriteStore(store, collections.writes, this.serde);
  }

  onModuleInit() {
    this.instance = this;
  }

  private async buildTuple(
    record: CheckpointRecord,
    metadata: CheckpointMetadata,
  ): Promise<CheckpointTuple> {
    const { threadId, checkpointNs, checkpointId } = record;

    const stored: Omit<Checkpoint, "channel_values"> =
      await this.serde.loadsTyped(record.checkpointType, record.checkpointData);
    const channelValues = await this.blobs.loadAll(
      threadId,
      checkpointNs,
      stored.channel_versions,
    );

    const tuple: CheckpointTuple = {
      config: checkpointConfig(threadId, checkpointNs, checkpointId),
      checkpoint: { ...stored, channel_values: channelValues },
      metadata,
    };

    if (record.parentCheckpointId) {
      tuple.parentConfig = checkpointConfig(
        threadId,
        checkpointNs,
        record.parentCheckpointId,
      );
    }

    return tuple;
  }

  async getTuple(config: RunnableConfig): Promise<CheckpointTuple | undefined> {
    this.logger.verbose("Starting GetTuple operation");

    const threadId = readThreadId(config);
    if (!threadId) {
      return undefined;
    }
    const checkpointNs = readCheckpointNs(config) ?? "";
    const checkpointId = readCheckpointId(config);

    try {
      const lookup = checkpointId
        ? await this.records.getExact(threadId, checkpointNs, checkpointId)
        : await this.records.getLatest(threadId, checkpointNs);

      if (!lookup.found) {
        this.logger.debug(
          `No checkpoint ${checkpointId ?? "(latest)"} for thread ${threadId}`,
        );
        return undefined;
      }

      const { record } = lookup;
      const [metadata, pendingWrites] = await Promise.all([
        this.serde.loadsTyped(record.metadataType, record.metadataData),
        this.writes.listForCheckpoint(
          threadId,
          checkpointNs,
          record.checkpointId,
        ),
      ]);

      const tuple = await this.buildTuple(record, metadata);
      tuple.pendingWrites = pendingWrites;

      this.logger.debug("GetTuple operation complete");
      return tuple;
    } catch (error) {
      this.logger.error(`Failed to get checkpoint tuple:`, error);
      throw error;
    }
  }

  async *list(
    config: RunnableConfig,
    options?: CheckpointListOptions,
  ): AsyncGenerator<CheckpointTuple> {
    this.logger.verbose("Starting List operation");
    const { before, limit, filter } = options ?? {};

    const records = this.records.list({
      threadId: readThreadId(config),
      checkpointNs: readCheckpointNs(config),
      checkpointId: readCheckpointId(config),
      before: before ? readCheckpointId(before) : undefined,
      filter,
      limit,
    });

    try {
      for await (const { record, metadata } of records) {
        yield await this.buildTuple(record, metadata);
      }
    } catch (error) {
      this.logger.error(`Failed to list checkpoints:`, error);
      throw error;
    }
  }

  async put(
    config: RunnableConfig,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
    newVersions: ChannelVersions,
  ): Promise<RunnableConfig> {
    this.logger.verbose("Starting Put operation");

    const threadId = readThreadId(config);
    if (!threadId) {
      throw new Error(
        `Failed to put checkpoint. The passed RunnableConfig is missing a required "thread_id" field in its "configurable" property.`,
      );
    }
    const checkpointNs = readCheckpointNs(config) ?? "";
    const parentCheckpointId = readCheckpointId(config) ?? null;

    try {
      const { channel_values: channelValues, ...body } =
        copyCheckpoint(checkpoint);

      // Every blob must be stored before the record that refers to it
      await Promise.all(
        Object.entries(newVersions).map(async ([channel, version]) => {
          const [blobType, blobData] =
            channel in channelValues
              ? await this.serde.dumpsTyped(channelValues[channel])
              : EMPTY_BLOB;
          await this.blobs.put(
            threadId,
            checkpointNs,
            channel,
            version,
            blobType,
            blobData,
          );
        }),
      );

      const [[checkpointType, checkpointData], [metadataType, metadataData]] =
        await Promise.all([
          this.serde.dumpsTyped(body),
          this.serde.dumpsTyped(metadata),
        ]);

      await this.records.put({
        threadId,
        checkpointNs,
        checkpointId: checkpoint.id,
        checkpointType,
        checkpointData,
        metadataType,
        metadataData,
        parentCheckpointId,
      });

      this.logger.debug("Put operation complete");

      return checkpointConfig(threadId, checkpointNs, checkpoint.id);
    } catch (error) {
      this.logger.error(`Failed to put checkpoint:`, error);
      throw error;
    }
  }

  async putWrites(
    config: RunnableConfig,
    writes: PendingWrite[],
    taskId: string,
    taskPath = "",
  ): Promise<void> {
    this.logger.verbose("Starting PutWrites operation");

    const threadId = readThreadId(config);
    const checkpointNs = readCheckpointNs(config) ?? "";
    const checkpointId = readCheckpointId(config);

    if (!threadId) {
      throw new Error(
        `Failed to put writes. The passed RunnableConfig is missing a required "thread_id" field in its "configurable" property`,
      );
    }
    if (!checkpointId) {
      throw new Error(
        `Failed to put writes. The passed RunnableConfig is missing a required "checkpoint_id" field in its "configurable" property.`,
      );
    }

    try {
      await this.writes.putMany(
        threadId,
        checkpointNs,
        checkpointId,
        taskId,
        taskPath,
        writes,
      );
      this.logger.debug("PutWrites operation complete");
    } catch (error) {
      this.logger.error(`Failed to put writes:`, error);
      throw error;
    }
  }

  /** Not atomic: a failure part way leaves the remaining documents behind */
  async deleteThread(threadId: string): Promise<void> {
    this.logger.verbose("Starting DeleteThread operation");
    try {
      const [checkpoints, blobs, writes] = await Promise.all([
        this.records.deleteThread(threadId),
        this.blobs.deleteThread(threadId),
        this.writes.deleteThread(threadId),
      ]);

      this.logger.debug(
        `Deleted ${checkpoints} checkpoints, ${blobs} blobs and ${writes} writes for thread ${threadId}`,
      );
    } catch (error) {
      this.logger.error(`Failed to delete thread ${threadId}:`, error);
      throw error;
    }
  }
}
