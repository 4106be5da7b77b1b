import * as Joi from "joi";

export const bigqueryValidationSchema = Joi.object({
  BIGQUERY_MAX_ROWS: Joi.number().integer().min(1).default(50),
  BIGQUERY_QUERY_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
  BIGQUERY_MAX_POLL_ATTEMPTS: Joi.number().integer().min(1).default(10),
});
