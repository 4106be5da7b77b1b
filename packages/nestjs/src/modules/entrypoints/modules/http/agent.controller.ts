import { randomUUID } from "node:crypto";

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
} from "@nestjs/common";
import { QueryBus } from "@nestjs/cqrs";

import { AnalystQuery } from "../../../../common/queries/analyst.query";
import { ThreadHistoryQuery } from "../../../../common/queries/thread-history.query";
import type {
  AgentHistoryResponseDto,
  AgentQueryResponseDto,
  ChatResponseDto,
} from "./dtos/agent.dto";
import { AgentQueryRequestDto } from "./dtos/agent.dto";

@Controller()
export class AgentController {
  private readonly logger = new Logger(AgentController.name);

  constructor(private readonly queryBus: QueryBus) {}

  @Post("agent/query")
  @HttpCode(HttpStatus.OK)
  async query(
    @Body() body: AgentQueryRequestDto,
  ): Promise<AgentQueryResponseDto> {
    const text = body.query ?? body.text ?? "";
    const threadId = body.thread_id ?? randomUUID();

    try {
      const answer = await this.queryBus.execute(
        new AnalystQuery(text, threadId),
      );

      return {
        response: answer.response,
        thread_id: answer.threadId,
        metadata: {
          steps: answer.steps,
          tool_calls: answer.toolCalls,
          tool_results: answer.toolResults,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`query on thread ${threadId} failed: ${message}`);
      throw new HttpException(
        {
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          error: "Agent query failed",
          message,
        },
        HttpStatus.INTERNAL_SERVER_ERROR,
        { cause: error },
      );
    }
  }

  @Get("agent/history/:threadId")
  async history(
    @Param("threadId") threadId: string,
  ): Promise<AgentHistoryResponseDto> {
    const messages = await this.queryBus.execute(
      new ThreadHistoryQuery(threadId),
    );
    return { thread_id: threadId, messages };
  }

  /** Legacy route, answers with the response text only */
  @Post("chat")
  @HttpCode(HttpStatus.OK)
  async chat(@Body() body: AgentQueryRequestDto): Promise<ChatResponseDto> {
    const { response } = await this.query(body);
    return { response };
  }
}
