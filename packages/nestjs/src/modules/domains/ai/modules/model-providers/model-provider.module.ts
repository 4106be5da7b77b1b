import { Module } from "@nestjs/common";
import { ConditionalModule } from "@nestjs/config";

import { LLM_Provider } from "../../../../config-management/types/config.types";
import { OpenAIModelProvider } from "./modules/openai/openai.module";

@Module({
  imports: [
    ConditionalModule.registerWhen(
      OpenAIModelProvider.register(),
      (env: NodeJS.ProcessEnv) =>
        env.LLM_PRIMARY_PROVIDER === LLM_Provider.OPENAI,
    ),
  ],
})
export class ModelProviderModule {}
