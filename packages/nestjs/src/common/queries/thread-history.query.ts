import { Query } from "@nestjs/cqrs";

import type { HistoryEntry } from "../types/analyst.types";

export class ThreadHistoryQuery extends Query<HistoryEntry[]> {
  constructor(readonly threadId: string) {
    super();
  }
}
