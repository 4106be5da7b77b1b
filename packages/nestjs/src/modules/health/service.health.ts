import { Inject, Injectable } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { HealthIndicatorService } from "@nestjs/terminus";

import {
  SERVICE_NAME,
  SERVICE_VERSION,
} from "../../common/constants/service.constants";
import commonConfig from "../config-management/configs/common.config";

@Injectable()
export class ServiceHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    @Inject(commonConfig.KEY)
    private readonly config: ConfigType<typeof commonConfig>,
  ) {}

  isUp(key: string) {
    return this.healthIndicatorService.check(key).up({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      environment: this.config.appEnv,
    });
  }
}
