import {
  type BaseMessage,
  isAIMessage,
  isToolMessage,
} from "@langchain/core/messages";

import type { HistoryEntry, MessageRole } from "../types/analyst.types";

/**
 * Plain text of a message. Structured content keeps its text parts only.
 */
export const messageText = (message: BaseMessage): string => {
  if (typeof message.content === "string") {
    return message.content;
  }
  return message.content
    .map((part) => (part.type === "text" && "text" in part ? part.text : ""))
    .join("");
};

export const messageRole = (message: BaseMessage): MessageRole | undefined => {
  switch (message.getType()) {
    case "human":
      return "user";
    case "ai":
      return "assistant";
    case "system":
    case "developer":
      return "system";
    case "tool":
      return "tool";
    // generic, function and remove messages never reach a thread's history
    default:
      return undefined;
  }
};

export const toHistoryEntries = (messages: BaseMessage[]): HistoryEntry[] =>
  messages.reduce<HistoryEntry[]>((entries, message) => {
    const role = messageRole(message);
    if (role) {
      entries.push({ role, content: messageText(message) });
    }
    return entries;
  }, []);

export const countToolCalls = (messages: BaseMessage[]): number =>
  messages.filter(
    (message) => isAIMessage(message) && (message.tool_calls?.length ?? 0) > 0,
  ).length;

export const countToolResults = (messages: BaseMessage[]): number =>
  messages.filter((message) => isToolMessage(message)).length;
