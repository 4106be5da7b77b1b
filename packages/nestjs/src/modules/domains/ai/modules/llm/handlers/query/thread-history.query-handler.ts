import { Injectable } from "@nestjs/common";
import { type IQueryHandler, QueryHandler } from "@nestjs/cqrs";

import { ThreadHistoryQuery } from "../../../../../../../common/queries/thread-history.query";
import type { HistoryEntry } from "../../../../../../../common/types/analyst.types";
import { AnalystService } from "../../services/analyst.service";

@QueryHandler(ThreadHistoryQuery)
@Injectable()
export class ThreadHistoryQueryHandler
  implements IQueryHandler<ThreadHistoryQuery, HistoryEntry[]>
{
  constructor(private readonly analystService: AnalystService) {}

  execute(query: ThreadHistoryQuery): Promise<HistoryEntry[]> {
    return this.analystService.history(query.threadId);
  }
}
