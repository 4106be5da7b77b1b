import * as Joi from "joi";

import { agentValidationSchema } from "./agent.schema";
import { bigqueryValidationSchema } from "./bigquery.schema";
import { commonValidationSchema } from "./common.schema";
import { firestoreValidationSchema } from "./firestore.schema";
import { gcpValidationSchema } from "./gcp.schema";
import { llmValidationSchema } from "./llm.schema";
import { llmOpenAiValidationSchema } from "./llm-openai.schema";

export const configValidationSchema = Joi.any()
  .concat(agentValidationSchema)
  .concat(bigqueryValidationSchema)
  .concat(commonValidationSchema)
  .concat(firestoreValidationSchema)
  .concat(gcpValidationSchema)
  .concat(llmValidationSchema)
  .concat(llmOpenAiValidationSchema);
