import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";
import { ModuleRef } from "@nestjs/core";

import { USER_AGENT } from "../../../../../common/constants/service.constants";
import firestoreConfig from "../../../../config-management/configs/firestore.config";
import gcpConfig from "../../../../config-management/configs/gcp.config";
import { StorageDriver } from "../../../../config-management/types/config.types";
import { GoogleCloudModule } from "../../../../google-cloud/google-cloud.module";
import { FirestoreDocumentStoreAdapter } from "./adapters/firestore.document-store.adapter";
import { InMemoryDocumentStoreAdapter } from "./adapters/in-memory.document-store.adapter";
import { FirestoreCheckpointerAdapter } from "./firestore.checkpointer.adapter";
import { CHECKPOINTER } from "./ports/checkpointer.port";
import { DOCUMENT_STORE } from "./ports/document-store.port";

const FIRESTORE_API_BASE_URL = "https://firestore.googleapis.com/v1/";

@Module({
  imports: [
    ConfigModule.forFeature(firestoreConfig),
    ConfigModule.forFeature(gcpConfig),
    GoogleCloudModule,
    HttpModule.registerAsync({
      imports: [ConfigModule.forFeature(firestoreConfig)],
      inject: [firestoreConfig.KEY],
      useFactory: (config: ConfigType<typeof firestoreConfig>) => {
        return {
          baseURL: config.emulatorHost
            ? `http://${config.emulatorHost}/v1/`
            : FIRESTORE_API_BASE_URL,
          headers: {
            "Content-Type": "application/json",
            "User-Agent": USER_AGENT,
          },
        };
      },
    }),
  ],
  providers: [
    {
      provide: DOCUMENT_STORE,
      inject: [firestoreConfig.KEY, ModuleRef],
      useFactory: (
        config: ConfigType<typeof firestoreConfig>,
        moduleRef: ModuleRef,
      ) => {
        if (config.driver === StorageDriver.MEMORY) {
          return new InMemoryDocumentStoreAdapter();
        }
        return moduleRef.create<FirestoreDocumentStoreAdapter>(
          FirestoreDocumentStoreAdapter,
        );
      },
    },
    {
      provide: CHECKPOINTER,
      useClass: FirestoreCheckpointerAdapter,
    },
  ],
  exports: [CHECKPOINTER],
})
export class LlmStorageModule {}
