import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { USER_AGENT } from "../../../../../common/constants/service.constants";
import bigqueryConfig from "../../../../config-management/configs/bigquery.config";
import gcpConfig from "../../../../config-management/configs/gcp.config";
import { GoogleCloudModule } from "../../../../google-cloud/google-cloud.module";
import { BigQueryService } from "./services/bigquery.service";

@Module({
  imports: [
    ConfigModule.forFeature(bigqueryConfig),
    ConfigModule.forFeature(gcpConfig),
    GoogleCloudModule,
    HttpModule.register({
      baseURL: "https://bigquery.googleapis.com/bigquery/v2/",
      headers: {
        "Content-Type": "application/json",
        "User-Agent": USER_AGENT,
      },
    }),
  ],
  providers: [BigQueryService],
  exports: [BigQueryService],
})
export class BigQueryModule {}
