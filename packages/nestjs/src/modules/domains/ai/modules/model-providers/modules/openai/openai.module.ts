import { type DynamicModule, Module, type Provider } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import llmOpenaiConfig from "../../../../../../config-management/configs/llm-openai.config";
import { LLM_Provider } from "../../../../../../config-management/types/config.types";
import { PRIMARY_CHAT_MODEL_PORT } from "../../ports/primary-model.port";
import { OpenAIModelProviderService } from "./openai.service";

@Module({})
export class OpenAIModelProvider {
  static register(): DynamicModule {
    const providers: Provider[] = [OpenAIModelProviderService];
    const exports: DynamicModule["exports"] = [OpenAIModelProviderService];

    let isGlobal = false;

    // When OpenAI is the primary provider its service is also exported under
    // the primary model token, so consumers need not know which provider won
    if (process.env.LLM_PRIMARY_PROVIDER === LLM_Provider.OPENAI) {
      providers.push({
        provide: PRIMARY_CHAT_MODEL_PORT,
        useExisting: OpenAIModelProviderService,
      });
      exports.push(PRIMARY_CHAT_MODEL_PORT);
      isGlobal = true;
    }

    return {
      module: OpenAIModelProvider,
      global: isGlobal,
      imports: [ConfigModule.forFeature(llmOpenaiConfig)],
      providers,
      exports,
    };
  }
}
