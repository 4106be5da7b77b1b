import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { DiscoveryModule } from "@nestjs/core";

import agentConfig from "../../../../config-management/configs/agent.config";
import { LlmStorageModule } from "../llm-storage/llm-storage.module";
import { AiToolsModule } from "../tools/tools.module";
import { BigQueryAnalystAgentAdapter } from "./adapters";

@Module({
  imports: [
    ConfigModule.forFeature(agentConfig),
    DiscoveryModule,
    LlmStorageModule,
    AiToolsModule,
  ],
  providers: [BigQueryAnalystAgentAdapter],
  exports: [BigQueryAnalystAgentAdapter],
})
export class AgentsModule {}
