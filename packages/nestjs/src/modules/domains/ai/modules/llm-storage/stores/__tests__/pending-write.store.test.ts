import { MemorySaver } from "@langchain/langgraph";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { InMemoryDocumentStoreAdapter } from "../../adapters/in-memory.document-store.adapter";
import { PendingWriteStore } from "../pending-write.store";

describe("PendingWriteStore", () => {
  const serde = new MemorySaver().serde;
  let documents: InMemoryDocumentStoreAdapter;
  let store: PendingWriteStore;

  beforeEach(() => {
    documents = new InMemoryDocumentStoreAdapter();
    store = new PendingWriteStore(documents, "writes", serde);
  });

  it("should record writes under their task and slot", async () => {
    await store.putMany("t1", "", "cp-1", "task-a", "~pull", [
      ["messages", "hello"],
      ["count", 1],
    ]);

    const writes = await store.listForCheckpoint("t1", "", "cp-1");
    expect(writes).toHaveLength(2);
    expect(writes).toEqual(
      expect.arrayContaining([
        ["task-a", "messages", "hello"],
        ["task-a", "count", 1],
      ]),
    );

    const lookup = await documents.get("writes", "t1____cp-1__task-a__1");
    expect(lookup.found && lookup.document.fields).toMatchObject({
      task_path: "~pull",
      idx: 1,
      channel: "count",
    });
  });

  it("should keep the first value of a regular write", async () => {
    await store.putMany("t1", "", "cp-1", "task-a", "", [["messages", "first"]]);
    await store.putMany("t1", "", "cp-1", "task-a", "", [["messages", "second"]]);

    await expect(store.listForCheckpoint("t1", "", "cp-1")).resolves.toEqual([
      ["task-a", "messages", "first"],
    ]);
  });

  it("should write special channels in batch order so the last one wins", async () => {
    const events: string[] = [];
    const upsert = documents.upsert.bind(documents);
    vi.spyOn(documents, "upsert").mockImplementation(
      async (collection, id, fields) => {
        events.push(`start ${id}`);
        // yield so a concurrent second upsert would start before this ends
        await new Promise((resolve) => setTimeout(resolve, 5));
        await upsert(collection, id, fields);
        events.push(`end ${id}`);
      },
    );

    await store.putMany("t1", "", "cp-1", "task-a", "", [
      ["__error__", "boom"],
      ["__error__", "again"],
    ]);

    expect(events).toEqual([
      "start t1____cp-1__task-a__-1",
      "end t1____cp-1__task-a__-1",
      "start t1____cp-1__task-a__-1",
      "end t1____cp-1__task-a__-1",
    ]);
    await expect(store.listForCheckpoint("t1", "", "cp-1")).resolves.toEqual([
      ["task-a", "__error__", "again"],
    ]);
  });

  it("should overwrite writes to special channels", async () => {
    const upsert = vi.spyOn(documents, "upsert");

    await store.putMany("t1", "", "cp-1", "task-a", "", [["__error__", "boom"]]);
    await store.putMany("t1", "", "cp-1", "task-a", "", [["__error__", "again"]]);

    expect(upsert).toHaveBeenCalledTimes(2);
    expect(upsert.mock.calls[0][1]).toBe("t1____cp-1__task-a__-1");
    await expect(store.listForCheckpoint("t1", "", "cp-1")).resolves.toEqual([
      ["task-a", "__error__", "again"],
    ]);
  });

  it("should only list writes of the requested checkpoint", async () => {
    await store.putMany("t1", "", "cp-1", "task-a", "", [["messages", "one"]]);
    await store.putMany("t1", "", "cp-2", "task-b", "", [["messages", "two"]]);
    await store.putMany("t1", "child", "cp-1", "task-c", "", [["messages", "three"]]);

    await expect(store.listForCheckpoint("t1", "", "cp-1")).resolves.toEqual([
      ["task-a", "messages", "one"],
    ]);
  });

  it("should return nothing for a checkpoint without writes", async () => {
    await expect(store.listForCheckpoint("t1", "", "cp-9")).resolves.toEqual(
      [],
    );
  });
});
