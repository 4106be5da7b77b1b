import { MemorySaver } from "@langchain/langgraph";
import { beforeEach, describe, expect, it } from "vitest";

import { InMemoryDocumentStoreAdapter } from "../../adapters/in-memory.document-store.adapter";
import { ChannelBlobStore } from "../channel-blob.store";

describe("ChannelBlobStore", () => {
  const serde = new MemorySaver().serde;
  let documents: InMemoryDocumentStoreAdapter;
  let store: ChannelBlobStore;

  const putValue = async (channel: string, version: string, value: unknown) => {
    const [type, data] = await serde.dumpsTyped(value);
    await store.put("thread-1", "", channel, version, type, data);
  };

  beforeEach(() => {
    documents = new InMemoryDocumentStoreAdapter();
    store = new ChannelBlobStore(documents, "blobs", serde);
  });

  it("should store the blob under its derived key", async () => {
    await putValue("messages", "1", ["hello"]);

    const lookup = await documents.get("blobs", "thread-1____messages__1");
    expect(lookup.found).toBe(true);
    if (lookup.found) {
      expect(lookup.document.fields).toMatchObject({
        thread_id: "thread-1",
        checkpoint_ns: "",
        channel: "messages",
        version: "1",
        blob_type: "json",
      });
    }
  });

  it("should load every channel at the requested version", async () => {
    await putValue("messages", "1", ["hello"]);
    await putValue("messages", "2", ["hello", "world"]);
    await putValue("count", "1", 3);

    const values = await store.loadAll("thread-1", "", {
      messages: "2",
      count: "1",
    });

    expect(values).toEqual({ messages: ["hello", "world"], count: 3 });
  });

  it("should omit channels without a stored blob", async () => {
    await putValue("messages", "1", ["hello"]);

    const values = await store.loadAll("thread-1", "", {
      messages: "1",
      missing: "4",
    });

    expect(values).toEqual({ messages: ["hello"] });
  });

  it("should omit channels stored with the empty sentinel", async () => {
    await store.put("thread-1", "", "branch:agent", "2", "empty", new Uint8Array(0));

    const values = await store.loadAll("thread-1", "", { "branch:agent": "2" });

    expect(values).toEqual({});
  });

  it("should keep a single document when the same blob is written twice", async () => {
    await putValue("messages", "1", ["hello"]);
    await putValue("messages", "1", ["hello"]);

    await expect(store.listForThread("thread-1")).resolves.toEqual([
      "thread-1____messages__1",
    ]);
  });

  it("should accept numeric versions", async () => {
    const [type, data] = await serde.dumpsTyped("value");
    await store.put("thread-1", "ns/a", "topic/x", 7, type, data);

    await expect(
      store.loadAll("thread-1", "ns/a", { "topic/x": 7 }),
    ).resolves.toEqual({ "topic/x": "value" });
    await expect(store.listForThread("thread-1")).resolves.toEqual([
      "thread-1__ns_a__topic_x__7",
    ]);
  });

  it("should delete only the blobs of the given thread", async () => {
    await putValue("messages", "1", ["hello"]);
    const [type, data] = await serde.dumpsTyped(["other"]);
    await store.put("thread-2", "", "messages", "1", type, data);

    await expect(store.deleteThread("thread-1")).resolves.toBe(1);

    await expect(store.listForThread("thread-1")).resolves.toEqual([]);
    await expect(store.listForThread("thread-2")).resolves.toHaveLength(1);
  });
});
