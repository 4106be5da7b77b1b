import { Query } from "@nestjs/cqrs";

import type { AnalystAnswer } from "../types/analyst.types";

/**
 * Asks the analyst agent a question within a conversation thread
 */
export class AnalystQuery extends Query<AnalystAnswer> {
  constructor(
    readonly text: string,
    readonly threadId: string,
  ) {
    super();
  }
}
