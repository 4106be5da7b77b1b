import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";

import { AgentController } from "./agent.controller";

@Module({
  imports: [CqrsModule],
  controllers: [AgentController],
})
export class HttpEntryPointModule {}
