import { Injectable, Logger } from "@nestjs/common";
import { type IQueryHandler, QueryHandler } from "@nestjs/cqrs";

import { AnalystQuery } from "../../../../../../../common/queries/analyst.query";
import type { AnalystAnswer } from "../../../../../../../common/types/analyst.types";
import { AnalystService } from "../../services/analyst.service";

@QueryHandler(AnalystQuery)
@Injectable()
export class AnalystQueryHandler
  implements IQueryHandler<AnalystQuery, AnalystAnswer>
{
  private readonly logger = new Logger(AnalystQueryHandler.name);

  constructor(private readonly analystService: AnalystService) {}

  async execute(query: AnalystQuery): Promise<AnalystAnswer> {
    const startTime = Date.now();

    try {
      return await this.analystService.query(query.text, query.threadId);
    } catch (error) {
      const errorObj =
        error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Analyst query failed after ${Date.now() - startTime}ms: ${errorObj.message}`,
        errorObj.stack,
      );
      throw errorObj;
    }
  }
}
