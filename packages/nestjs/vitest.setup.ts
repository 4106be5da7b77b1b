// Setup environment variables for tests
process.env.NODE_ENV = "test";
process.env.APP_ENV = "test";

// Google Cloud
process.env.GOOGLE_CLOUD_PROJECT = "test-project";
process.env.GOOGLE_CLOUD_LOCATION = "US";

// Checkpoint storage
process.env.CHECKPOINT_STORAGE_DRIVER = "memory";
process.env.FIRESTORE_EMULATOR_HOST = "localhost:8681";

// LLM Configuration
process.env.LLM_PRIMARY_PROVIDER = "openai";
process.env.LLM_OPENAI_KEY = "test-openai-key";
process.env.LLM_OPENAI_MODEL = "gpt-4o-mini";
