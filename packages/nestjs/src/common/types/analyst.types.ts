export type MessageRole = "user" | "assistant" | "system" | "tool";

/**
 * Outcome of one analyst turn on a thread
 */
export interface AnalystAnswer {
  /** text of the last message in the thread */
  response: string;
  threadId: string;
  /** number of messages in the thread after the turn */
  steps: number;
  /** assistant messages that requested at least one tool */
  toolCalls: number;
  /** tool messages in the thread */
  toolResults: number;
}

export interface HistoryEntry {
  role: MessageRole;
  content: string;
}
