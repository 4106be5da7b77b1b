import type { RunnableConfig } from "@langchain/core/runnables";
import type {
  Checkpoint,
  CheckpointMetadata,
  CheckpointTuple,
} from "@langchain/langgraph";
import {
  type ChannelVersions,
  emptyCheckpoint,
} from "@langchain/langgraph-checkpoint";
import { beforeEach, describe, expect, it, vi } from "vitest";

import firestoreConfig from "../../../../../config-management/configs/firestore.config";
import { InMemoryDocumentStoreAdapter } from "../adapters/in-memory.document-store.adapter";
import { FirestoreCheckpointerAdapter } from "../firestore.checkpointer.adapter";

const FIRST = "2024-01-01T00:00:00Z";
const SECOND = "2024-01-01T00:00:05Z";
const THIRD = "2024-01-01T00:00:10Z";

function buildCheckpoint(
  id: string,
  values: Record<string, unknown>,
  versions: ChannelVersions,
): Checkpoint {
  return {
    ...emptyCheckpoint(),
    id,
    ts: id,
    channel_values: values,
    channel_versions: versions,
  };
}

function buildMetadata(step: number): CheckpointMetadata {
  return { source: "loop", step, parents: {} };
}

function threadConfig(threadId: string, checkpointId?: string): RunnableConfig {
  return {
    configurable: {
      thread_id: threadId,
      checkpoint_ns: "",
      ...(checkpointId ? { checkpoint_id: checkpointId } : {}),
    },
  };
}

describe("FirestoreCheckpointerAdapter", () => {
  let documents: InMemoryDocumentStoreAdapter;
  let saver: FirestoreCheckpointerAdapter;

  const collectList = async (
    config: RunnableConfig,
    options?: Parameters<FirestoreCheckpointerAdapter["list"]>[1],
  ): Promise<CheckpointTuple[]> => {
    const tuples: CheckpointTuple[] = [];
    for await (const tuple of saver.list(config, options)) {
      tuples.push(tuple);
    }
    return tuples;
  };

  /** Three checkpoints on thread t1, each a child of the previous */
  const seedThread = async (threadId = "t1") => {
    const first = await saver.put(
      threadConfig(threadId),
      buildCheckpoint(FIRST, { messages: ["hi"] }, { messages: "1" }),
      buildMetadata(-1),
      { messages: "1" },
    );
    const second = await saver.put(
      first,
      buildCheckpoint(
        SECOND,
        { messages: ["hi", "hello"], count: 1 },
        { messages: "2", count: "1" },
      ),
      buildMetadata(0),
      { messages: "2", count: "1" },
    );
    // only "count" changes; "messages" stays at version 2
    const third = await saver.put(
      second,
      buildCheckpoint(
        THIRD,
        { messages: ["hi", "hello"], count: 2 },
        { messages: "2", count: "2" },
      ),
      buildMetadata(1),
      { count: "2" },
    );
    return { first, second, third };
  };

  beforeEach(() => {
    documents = new InMemoryDocumentStoreAdapter();
    saver = new FirestoreCheckpointerAdapter(documents, firestoreConfig());
    saver.onModuleInit();
  });

  it("should expose itself as the checkpointer instance", () => {
    expect(saver.instance).toBe(saver);
  });

  describe("put", () => {
    it("should return a config carrying all three ids", async () => {
      const config = await saver.put(
        threadConfig("t1"),
        buildCheckpoint(FIRST, {}, {}),
        buildMetadata(-1),
        {},
      );

      expect(config).toEqual({
        configurable: { thread_id: "t1", checkpoint_ns: "", checkpoint_id: FIRST },
      });
    });

    it("should reject a config without a thread id", async () => {
      await expect(
        saver.put({ configurable: {} }, buildCheckpoint(FIRST, {}, {}), buildMetadata(0), {}),
      ).rejects.toThrow('missing a required "thread_id" field');
    });

    it("should store every blob before the checkpoint record", async () => {
      const upsert = vi.spyOn(documents, "upsert");

      await saver.put(
        threadConfig("t1"),
        buildCheckpoint(FIRST, { a: 1, b: 2 }, { a: "1", b: "1" }),
        buildMetadata(0),
        { a: "1", b: "1" },
      );

      expect(upsert.mock.calls.map(([collection]) => collection)).toEqual([
        "blobs",
        "blobs",
        "checkpoints",
      ]);
    });

    it("should store the empty sentinel for versioned channels without a value", async () => {
      await saver.put(
        threadConfig("t1"),
        buildCheckpoint(FIRST, {}, { "branch:agent": "1" }),
        buildMetadata(0),
        { "branch:agent": "1" },
      );

      const lookup = await documents.get("blobs", "t1____branch:agent__1");
      expect(lookup.found && lookup.document.fields).toMatchObject({
        blob_type: "empty",
        blob_data: new Uint8Array(0),
      });

      const tuple = await saver.getTuple(threadConfig("t1"));
      expect(tuple?.checkpoint.channel_values).toEqual({});
      expect(tuple?.checkpoint.channel_versions).toEqual({ "branch:agent": "1" });
    });

    it("should only write blobs for new versions", async () => {
      await seedThread();

      const blobs = await documents.query("blobs", { where: { thread_id: "t1" } });
      expect(blobs.map((blob) => blob.id).sort()).toEqual([
        "t1____count__1",
        "t1____count__2",
        "t1____messages__1",
        "t1____messages__2",
      ]);
    });
  });

  describe("getTuple", () => {
    it("should load an exact checkpoint with its channel values", async () => {
      await seedThread();

      const tuple = await saver.getTuple(threadConfig("t1", SECOND));

      expect(tuple?.config).toEqual(threadConfig("t1", SECOND));
      expect(tuple?.checkpoint).toEqual(
        buildCheckpoint(
          SECOND,
          { messages: ["hi", "hello"], count: 1 },
          { messages: "2", count: "1" },
        ),
      );
      expect(tuple?.metadata).toEqual(buildMetadata(0));
      expect(tuple?.parentConfig).toEqual(threadConfig("t1", FIRST));
      expect(tuple?.pendingWrites).toEqual([]);
    });

    it("should resolve the latest checkpoint when no id is given", async () => {
      await seedThread();

      const tuple = await saver.getTuple({ configurable: { thread_id: "t1" } });

      expect(tuple?.config).toEqual(threadConfig("t1", THIRD));
      expect(tuple?.checkpoint.channel_values).toEqual({
        messages: ["hi", "hello"],
        count: 2,
      });
      expect(tuple?.parentConfig).toEqual(threadConfig("t1", SECOND));
    });

    it("should omit the parent of the first checkpoint", async () => {
      await seedThread();

      const tuple = await saver.getTuple(threadConfig("t1", FIRST));

      expect(tuple?.parentConfig).toBeUndefined();
    });

    it("should return undefined for unknown threads and checkpoints", async () => {
      await seedThread();

      await expect(saver.getTuple(threadConfig("t9"))).resolves.toBeUndefined();
      await expect(
        saver.getTuple(threadConfig("t1", "2030-01-01T00:00:00Z")),
      ).resolves.toBeUndefined();
      await expect(saver.getTuple({ configurable: {} })).resolves.toBeUndefined();
    });

    it("should keep namespaces apart", async () => {
      await seedThread();
      await saver.put(
        { configurable: { thread_id: "t1", checkpoint_ns: "child" } },
        buildCheckpoint(FIRST, { messages: ["nested"] }, { messages: "1" }),
        buildMetadata(0),
        { messages: "1" },
      );

      const child = await saver.getTuple({
        configurable: { thread_id: "t1", checkpoint_ns: "child" },
      });
      const root = await saver.getTuple(threadConfig("t1"));

      expect(child?.checkpoint.channel_values).toEqual({ messages: ["nested"] });
      expect(root?.config.configurable?.checkpoint_id).toBe(THIRD);
    });
  });

  describe("putWrites", () => {
    it("should attach pending writes to the checkpoint", async () => {
      const { third } = await seedThread();

      await saver.putWrites(third, [["messages", "pending"]], "task-1");

      const tuple = await saver.getTuple(threadConfig("t1"));
      expect(tuple?.pendingWrites).toEqual([["task-1", "messages", "pending"]]);

      const parent = await saver.getTuple(threadConfig("t1", SECOND));
      expect(parent?.pendingWrites).toEqual([]);
    });

    it("should keep the first value when a task retries a write", async () => {
      const { third } = await seedThread();

      await saver.putWrites(third, [["messages", "first"]], "task-1");
      await saver.putWrites(third, [["messages", "retried"]], "task-1");

      const tuple = await saver.getTuple(third);
      expect(tuple?.pendingWrites).toEqual([["task-1", "messages", "first"]]);
    });

    it("should store the task path", async () => {
      const { third } = await seedThread();

      await saver.putWrites(third, [["messages", "x"]], "task-1", "~pull:agent");

      const lookup = await documents.get("writes", `t1____${THIRD}__task-1__0`);
      expect(lookup.found && lookup.document.fields.task_path).toBe(
        "~pull:agent",
      );
    });

    it("should reject configs without a thread or checkpoint id", async () => {
      await expect(
        saver.putWrites({ configurable: { checkpoint_id: FIRST } }, [], "task-1"),
      ).rejects.toThrow('missing a required "thread_id" field');
      await expect(
        saver.putWrites(threadConfig("t1"), [], "task-1"),
      ).rejects.toThrow('missing a required "checkpoint_id" field');
    });
  });

  describe("list", () => {
    it("should list a thread newest first without pending writes", async () => {
      const { third } = await seedThread();
      await saver.putWrites(third, [["messages", "pending"]], "task-1");

      const tuples = await collectList(threadConfig("t1"));

      expect(tuples.map((tuple) => tuple.checkpoint.id)).toEqual([
        THIRD,
        SECOND,
        FIRST,
      ]);
      expect(tuples[0].pendingWrites).toBeUndefined();
      expect(tuples[0].checkpoint.channel_values).toEqual({
        messages: ["hi", "hello"],
        count: 2,
      });
      expect(tuples[2].parentConfig).toBeUndefined();
    });

    it("should page with the before cursor and limit", async () => {
      await seedThread();

      const tuples = await collectList(threadConfig("t1"), {
        before: threadConfig("t1", THIRD),
        limit: 1,
      });

      expect(tuples.map((tuple) => tuple.checkpoint.id)).toEqual([SECOND]);
    });

    it("should filter on metadata", async () => {
      await seedThread();

      const tuples = await collectList(threadConfig("t1"), {
        filter: { step: 0 },
      });

      expect(tuples.map((tuple) => tuple.metadata)).toEqual([buildMetadata(0)]);
    });

    it("should list every namespace of the thread when none is given", async () => {
      await seedThread("t1");
      await saver.put(
        { configurable: { thread_id: "t1", checkpoint_ns: "child" } },
        buildCheckpoint(FIRST, {}, {}),
        buildMetadata(0),
        {},
      );

      const tuples = await collectList({ configurable: { thread_id: "t1" } });

      expect(
        tuples.map((tuple) => String(tuple.config.configurable?.checkpoint_ns)).sort(),
      ).toEqual(["", "", "", "child"]);
    });

    it("should list every thread when no thread is given", async () => {
      await seedThread("t1");
      await seedThread("t2");

      const tuples = await collectList({ configurable: {} }, { limit: 3 });

      expect(
        tuples.map((tuple) => tuple.config.configurable?.thread_id),
      ).toHaveLength(3);
      expect(tuples.map((tuple) => tuple.checkpoint.id)).toEqual([
        THIRD,
        THIRD,
        SECOND,
      ]);
    });
  });

  describe("colliding document ids", () => {
    // ("a__", "b") and ("a", "__b") derive the same ids
    const owner = { thread_id: "a__", checkpoint_ns: "b" };
    const other = { thread_id: "a", checkpoint_ns: "__b" };

    beforeEach(async () => {
      await saver.put(
        { configurable: owner },
        buildCheckpoint(FIRST, { messages: ["secret"] }, { messages: "1" }),
        buildMetadata(0),
        { messages: "1" },
      );
    });

    it("should not return a checkpoint stored for another thread", async () => {
      await expect(
        saver.getTuple({ configurable: { ...other, checkpoint_id: FIRST } }),
      ).resolves.toBeUndefined();

      const tuple = await saver.getTuple({
        configurable: { ...owner, checkpoint_id: FIRST },
      });
      expect(tuple?.checkpoint.channel_values).toEqual({
        messages: ["secret"],
      });
    });

    it("should not load channel values stored for another thread", async () => {
      // versioned at "1" without writing a blob of its own
      await saver.put(
        { configurable: other },
        buildCheckpoint(SECOND, {}, { messages: "1" }),
        buildMetadata(0),
        {},
      );

      const tuple = await saver.getTuple({
        configurable: { ...other, checkpoint_id: SECOND },
      });
      expect(tuple?.config.configurable).toEqual({
        ...other,
        checkpoint_id: SECOND,
      });
      expect(tuple?.checkpoint.channel_values).toEqual({});
    });
  });

  describe("deleteThread", () => {
    it("should remove checkpoints, blobs and writes of the thread only", async () => {
      const { third } = await seedThread("t1");
      await saver.putWrites(third, [["messages", "pending"]], "task-1");
      await seedThread("t2");

      await saver.deleteThread("t1");

      await expect(saver.getTuple(threadConfig("t1"))).resolves.toBeUndefined();
      for (const collection of ["checkpoints", "blobs", "writes"]) {
        await expect(
          documents.query(collection, { where: { thread_id: "t1" } }),
        ).resolves.toEqual([]);
      }
      await expect(collectList(threadConfig("t1"))).resolves.toEqual([]);
      const remaining = await saver.getTuple(threadConfig("t2"));
      expect(remaining?.checkpoint.id).toBe(THIRD);
    });

    it("should succeed for an unknown thread", async () => {
      await expect(saver.deleteThread("t9")).resolves.toBeUndefined();
    });
  });
});
