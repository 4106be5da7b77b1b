import { registerAs } from "@nestjs/config";

import { StorageDriver } from "../types/config.types";

export default registerAs("firestore", () => ({
  driver:
    process.env.CHECKPOINT_STORAGE_DRIVER === StorageDriver.MEMORY
      ? StorageDriver.MEMORY
      : StorageDriver.FIRESTORE,
  database: process.env.FIRESTORE_DATABASE ?? "(default)",
  emulatorHost: process.env.FIRESTORE_EMULATOR_HOST,

  collections: {
    checkpoints: process.env.FIRESTORE_CHECKPOINTS_COLLECTION ?? "checkpoints",
    blobs: process.env.FIRESTORE_BLOBS_COLLECTION ?? "blobs",
    writes: process.env.FIRESTORE_WRITES_COLLECTION ?? "writes",
  },

  requestTimeoutMs: Number.parseInt(
    process.env.FIRESTORE_REQUEST_TIMEOUT_MS ?? "10000",
    10,
  ),
  maxRetries: Number.parseInt(process.env.FIRESTORE_MAX_RETRIES ?? "3", 10),
  retryBaseDelayMs: Number.parseInt(
    process.env.FIRESTORE_RETRY_BASE_DELAY_MS ?? "200",
    10,
  ),
}));
