import * as Joi from "joi";

import { StorageDriver } from "../types/config.types";

export const firestoreValidationSchema = Joi.object({
  CHECKPOINT_STORAGE_DRIVER: Joi.string()
    .valid(...Object.values(StorageDriver))
    .default(StorageDriver.FIRESTORE),
  FIRESTORE_DATABASE: Joi.string().default("(default)"),
  FIRESTORE_EMULATOR_HOST: Joi.string()
    .optional()
    .description("host:port of a local Firestore emulator"),

  FIRESTORE_CHECKPOINTS_COLLECTION: Joi.string().default("checkpoints"),
  FIRESTORE_BLOBS_COLLECTION: Joi.string().default("blobs"),
  FIRESTORE_WRITES_COLLECTION: Joi.string().default("writes"),

  FIRESTORE_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  FIRESTORE_MAX_RETRIES: Joi.number().integer().min(0).default(3),
  FIRESTORE_RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(200),
});
