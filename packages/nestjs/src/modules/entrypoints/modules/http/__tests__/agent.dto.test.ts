import { plainToInstance } from "class-transformer";
import { validate } from "class-validator";
import { describe, expect, it } from "vitest";

import { AgentQueryRequestDto } from "../dtos/agent.dto";

const failedProperties = async (body: object) => {
  const errors = await validate(plainToInstance(AgentQueryRequestDto, body));
  return errors.map((error) => error.property);
};

describe("AgentQueryRequestDto", () => {
  it("should accept a question with a thread", async () => {
    await expect(
      failedProperties({ text: "How many orders?", thread_id: "thread-1" }),
    ).resolves.toEqual([]);
  });

  it("should require text", async () => {
    await expect(failedProperties({})).resolves.toEqual(["text"]);
  });

  it("should reject empty text", async () => {
    await expect(failedProperties({ text: "" })).resolves.toEqual(["text"]);
  });

  it("should reject text over 10000 characters", async () => {
    await expect(
      failedProperties({ text: "a".repeat(10001) }),
    ).resolves.toEqual(["text"]);
  });

  it("should accept the legacy query field in place of text", async () => {
    await expect(
      failedProperties({ query: "How many orders?" }),
    ).resolves.toEqual([]);
  });

  it("should reject an empty thread id", async () => {
    await expect(
      failedProperties({ text: "How many orders?", thread_id: "" }),
    ).resolves.toEqual(["thread_id"]);
  });
});
