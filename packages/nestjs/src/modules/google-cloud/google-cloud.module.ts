import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";
import { GoogleAuth } from "google-auth-library";

import gcpConfig from "../config-management/configs/gcp.config";
import { GOOGLE_AUTH, GOOGLE_CLOUD_SCOPES } from "./google-cloud.constants";
import { GoogleCredentialsService } from "./services/google-credentials.service";

@Module({
  imports: [ConfigModule.forFeature(gcpConfig)],
  providers: [
    {
      provide: GOOGLE_AUTH,
      inject: [gcpConfig.KEY],
      useFactory: (config: ConfigType<typeof gcpConfig>) =>
        new GoogleAuth({
          projectId: config.projectId,
          scopes: GOOGLE_CLOUD_SCOPES,
        }),
    },
    GoogleCredentialsService,
  ],
  exports: [GoogleCredentialsService],
})
export class GoogleCloudModule {}
