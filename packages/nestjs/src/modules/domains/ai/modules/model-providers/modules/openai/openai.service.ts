import { ChatOpenAI } from "@langchain/openai";
import { Inject, Injectable, Logger, type OnModuleInit } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import llmOpenaiConfig from "../../../../../../config-management/configs/llm-openai.config";
import type { PrimaryChatModelPort } from "../../ports/primary-model.port";

@Injectable()
export class OpenAIModelProviderService
  implements PrimaryChatModelPort, OnModuleInit
{
  private readonly logger = new Logger(OpenAIModelProviderService.name);
  public model!: ChatOpenAI;

  constructor(
    @Inject(llmOpenaiConfig.KEY)
    private readonly config: ConfigType<typeof llmOpenaiConfig>,
  ) {}

  onModuleInit() {
    this.logger.debug(`registering the openai model ${this.config.model}`);
    this.model = new ChatOpenAI({
      apiKey: this.config.apiKey,
      model: this.config.model,
      configuration: {
        baseURL: this.config.baseUrl,
      },
      temperature: this.config.temp,
    });
  }
}
