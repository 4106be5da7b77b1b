export enum NodeEnv {
  PRODUCTION = "production",
  DEVELOPMENT = "development",
  TEST = "test",
}

export enum LLM_Provider {
  OPENAI = "openai",
}

export enum StorageDriver {
  FIRESTORE = "firestore",
  MEMORY = "memory",
}
