import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import agentConfig from "./configs/agent.config";
import bigqueryConfig from "./configs/bigquery.config";
import commonConfig from "./configs/common.config";
import firestoreConfig from "./configs/firestore.config";
import gcpConfig from "./configs/gcp.config";
import llmConfig from "./configs/llm.config";
import llmOpenaiConfig from "./configs/llm-openai.config";
import { configValidationSchema } from "./schemas/config.schema";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      expandVariables: true,
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
      load: [
        agentConfig,
        bigqueryConfig,
        commonConfig,
        firestoreConfig,
        gcpConfig,
        llmConfig,
        llmOpenaiConfig,
      ],
    }),
  ],
})
export class ConfigManagementModule {}
