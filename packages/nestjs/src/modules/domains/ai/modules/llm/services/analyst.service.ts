import {
  type BaseMessage,
  HumanMessage,
  isBaseMessage,
} from "@langchain/core/messages";
import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import type {
  AnalystAnswer,
  HistoryEntry,
} from "../../../../../../common/types/analyst.types";
import {
  countToolCalls,
  countToolResults,
  messageText,
  toHistoryEntries,
} from "../../../../../../common/utils/message.utils";
import agentConfig from "../../../../../config-management/configs/agent.config";
import { BigQueryAnalystAgentAdapter } from "../../agents/adapters/bigquery-analyst.agent";

@Injectable()
export class AnalystService {
  private readonly logger = new Logger(AnalystService.name);

  constructor(
    private readonly agent: BigQueryAnalystAgentAdapter,
    @Inject(agentConfig.KEY)
    private readonly config: ConfigType<typeof agentConfig>,
  ) {}

  async query(text: string, threadId: string): Promise<AnalystAnswer> {
    this.logger.log(
      `Processing query (thread=${threadId}): ${text.slice(0, 100)}`,
    );

    const { messages } = await this.agent.getGraph().invoke(
      { messages: [new HumanMessage(text)] },
      {
        configurable: { thread_id: threadId },
        recursionLimit: this.config.recursionLimit,
      },
    );

    const lastMessage = messages.at(-1);
    const answer: AnalystAnswer = {
      response: lastMessage ? messageText(lastMessage) : "",
      threadId,
      steps: messages.length,
      toolCalls: countToolCalls(messages),
      toolResults: countToolResults(messages),
    };

    this.logger.log(
      `Query completed: ${answer.steps} messages, ${answer.toolCalls} tool calls`,
    );
    return answer;
  }

  async history(threadId: string): Promise<HistoryEntry[]> {
    const snapshot = await this.agent
      .getGraph()
      .getState({ configurable: { thread_id: threadId } });

    const messages: unknown = snapshot.values?.messages;
    if (!Array.isArray(messages)) {
      this.logger.debug(`no messages stored for thread ${threadId}`);
      return [];
    }

    return toHistoryEntries(
      messages.filter((message): message is BaseMessage =>
        isBaseMessage(message),
      ),
    );
  }
}
