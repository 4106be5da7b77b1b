import * as Joi from "joi";

export const gcpValidationSchema = Joi.object({
  GOOGLE_CLOUD_PROJECT: Joi.string()
    .required()
    .description("Project hosting Firestore and running BigQuery jobs"),
  GOOGLE_CLOUD_LOCATION: Joi.string().default("US"),
});
