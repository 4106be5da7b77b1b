import * as Joi from "joi";

export const agentValidationSchema = Joi.object({
  AGENT_RECURSION_LIMIT: Joi.number().integer().min(1).default(15),
  AGENT_SYSTEM_PROMPT_PATH: Joi.string()
    .default("prompts/analyst.prompt.txt")
    .description("System prompt file, relative to the working directory"),
});
