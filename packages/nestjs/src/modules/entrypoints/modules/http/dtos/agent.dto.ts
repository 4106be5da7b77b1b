import {
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  ValidateIf,
} from "class-validator";

import type { HistoryEntry } from "../../../../../common/types/analyst.types";

export const MAX_QUERY_LENGTH = 10000;

export class AgentQueryRequestDto {
  // required unless the legacy `query` field carries the question
  @ValidateIf((dto: AgentQueryRequestDto) => dto.query === undefined)
  @IsString()
  @Length(1, MAX_QUERY_LENGTH)
  text?: string;

  /** @deprecated legacy alias of `text`, wins when both are sent */
  @IsOptional()
  @IsString()
  @Length(1, MAX_QUERY_LENGTH)
  query?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  thread_id?: string;
}

export interface AgentQueryResponseDto {
  response: string;
  thread_id: string;
  metadata: {
    steps: number;
    tool_calls: number;
    tool_results: number;
  };
}

export interface AgentHistoryResponseDto {
  thread_id: string;
  messages: HistoryEntry[];
}

export interface ChatResponseDto {
  response: string;
}
