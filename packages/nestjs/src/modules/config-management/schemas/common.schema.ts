import * as Joi from "joi";

import { NodeEnv } from "../types/config.types";

export const commonValidationSchema = Joi.object({
  // Environment
  NODE_ENV: Joi.string()
    .valid(...Object.values(NodeEnv))
    .default(NodeEnv.DEVELOPMENT),
  APP_ENV: Joi.string().default("production"),
  PORT: Joi.number().default(8080),
});
