import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { CqrsModule } from "@nestjs/cqrs";

import agentConfig from "../../../../config-management/configs/agent.config";
import { AgentsModule } from "../agents/agents.module";
import { AnalystQueryHandler } from "./handlers/query/analyst.query-handler";
import { ThreadHistoryQueryHandler } from "./handlers/query/thread-history.query-handler";
import { AnalystService } from "./services/analyst.service";

const queryHandlers = [AnalystQueryHandler, ThreadHistoryQueryHandler];

@Module({
  imports: [CqrsModule, ConfigModule.forFeature(agentConfig), AgentsModule],
  providers: [...queryHandlers, AnalystService],
})
export class LlmModule {}
