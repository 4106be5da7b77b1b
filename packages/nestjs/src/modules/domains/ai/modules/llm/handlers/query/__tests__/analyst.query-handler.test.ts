import { describe, expect, it, vi } from "vitest";

import { AnalystQuery } from "../../../../../../../../common/queries/analyst.query";
import { ThreadHistoryQuery } from "../../../../../../../../common/queries/thread-history.query";
import type { AnalystService } from "../../../services/analyst.service";
import { AnalystQueryHandler } from "../analyst.query-handler";
import { ThreadHistoryQueryHandler } from "../thread-history.query-handler";

describe("AnalystQueryHandler", () => {
  it("should delegate to the analyst service", async () => {
    const answer = {
      response: "There are 12 orders.",
      threadId: "thread-1",
      steps: 4,
      toolCalls: 1,
      toolResults: 1,
    };
    const analystService = {
      query: vi.fn().mockResolvedValue(answer),
    } as unknown as AnalystService;

    const handler = new AnalystQueryHandler(analystService);

    await expect(
      handler.execute(new AnalystQuery("How many orders?", "thread-1")),
    ).resolves.toBe(answer);
    expect(analystService.query).toHaveBeenCalledWith(
      "How many orders?",
      "thread-1",
    );
  });

  it("should rethrow failures", async () => {
    const analystService = {
      query: vi.fn().mockRejectedValue(new Error("model unavailable")),
    } as unknown as AnalystService;

    const handler = new AnalystQueryHandler(analystService);

    await expect(
      handler.execute(new AnalystQuery("How many orders?", "thread-1")),
    ).rejects.toThrow("model unavailable");
  });
});

describe("ThreadHistoryQueryHandler", () => {
  it("should return the thread history", async () => {
    const entries = [{ role: "user", content: "Hi" }];
    const analystService = {
      history: vi.fn().mockResolvedValue(entries),
    } as unknown as AnalystService;

    const handler = new ThreadHistoryQueryHandler(analystService);

    await expect(
      handler.execute(new ThreadHistoryQuery("thread-1")),
    ).resolves.toBe(entries);
    expect(analystService.history).toHaveBeenCalledWith("thread-1");
  });
});
