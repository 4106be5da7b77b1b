/** biome-ignore-all lint/suspicious/noThenProperty: Joi conditional schema */
import * as Joi from "joi";

import { LLM_Provider } from "../types/config.types";

export const llmOpenAiValidationSchema = Joi.object({
  LLM_OPENAI_MODEL: Joi.any().when("LLM_PRIMARY_PROVIDER", {
    is: LLM_Provider.OPENAI,
    then: Joi.string().default("gpt-4o"),
    otherwise: Joi.string().optional(),
  }),
  LLM_OPENAI_TEMP: Joi.number().min(0.0).max(1.0).default(0),
  LLM_OPENAI_KEY: Joi.any().when("LLM_PRIMARY_PROVIDER", {
    is: LLM_Provider.OPENAI,
    then: Joi.string().required(),
    otherwise: Joi.string().optional(),
  }),
  LLM_OPENAI_BASE_URL: Joi.string().optional(),
});
