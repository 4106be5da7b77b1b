import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TerminusModule } from "@nestjs/terminus";

import commonConfig from "../config-management/configs/common.config";
import { HealthController } from "./health.controller";
import { ServiceHealthIndicator } from "./service.health";

@Module({
  imports: [TerminusModule, ConfigModule.forFeature(commonConfig)],
  controllers: [HealthController],
  providers: [ServiceHealthIndicator],
})
export class HealthModule {}
