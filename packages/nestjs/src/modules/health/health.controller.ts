import { Controller, Get } from "@nestjs/common";
import {
  DiskHealthIndicator,
  HealthCheck,
  HealthCheckService,
} from "@nestjs/terminus";

import { ServiceHealthIndicator } from "./service.health";

@Controller()
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private readonly disk: DiskHealthIndicator,
    private readonly service: ServiceHealthIndicator,
  ) {}

  @Get(["/", "health"])
  @HealthCheck()
  check() {
    return this.health.check([
      () =>
        this.disk.checkStorage("storage", { path: "/", thresholdPercent: 0.9 }),
      () => this.service.isUp("service"),
    ]);
  }
}
