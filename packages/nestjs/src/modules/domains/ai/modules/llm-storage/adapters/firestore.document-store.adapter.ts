import { HttpService } from "@nestjs/axios";
import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { type AxiosResponse, isAxiosError } from "axios";
import {
  catchError,
  firstValueFrom,
  type Observable,
  retry,
  throwError,
  timeout,
  TimeoutError,
  timer,
} from "rxjs";

import firestoreConfig from "../../../../../config-management/configs/firestore.config";
import gcpConfig from "../../../../../config-management/configs/gcp.config";
import { GoogleCredentialsService } from "../../../../../google-cloud/services/google-credentials.service";
import {
  decodeFields,
  type DocumentFields,
  encodeFields,
  encodeValue,
  type FirestoreFields,
} from "../codec/firestore-value.codec";
import type {
  CreateOutcome,
  DocumentLookup,
  DocumentQuery,
  DocumentStorePort,
  StoredDocument,
} from "../ports/document-store.port";
import { DocumentStoreError } from "./document-store.error";

// The emulator accepts any bearer token, "owner" grants admin access
export const FIRESTORE_EMULATOR_TOKEN = "owner";

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Interface for a Firestore REST v1 document
 */
export interface FirestoreDocument {
  name: string;
  fields?: FirestoreFields;
  createTime?: string;
  updateTime?: string;
}

/**
 * Interface for one entry of a `documents:runQuery` response stream
 */
export interface RunQueryResponseEntry {
  document?: FirestoreDocument;
  readTime?: string;
  skippedResults?: number;
}

interface FieldFilter {
  fieldFilter: {
    field: { fieldPath: string };
    op: "EQUAL";
    value: ReturnType<typeof encodeValue>;
  };
}

interface StructuredQuery {
  from: { collectionId: string }[];
  where?: FieldFilter | { compositeFilter: { op: "AND"; filters: FieldFilter[] } };
  orderBy?: { field: { fieldPath: string }; direction: string }[];
  limit?: number;
}

function isTransient(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (isAxiosError(error)) {
    // network failure, no response received
    if (!error.response) return true;
    return TRANSIENT_STATUSES.has(error.response.status);
  }
  return false;
}

function documentId(name: string): string {
  return name.slice(name.lastIndexOf("/") + 1);
}

@Injectable()
export class FirestoreDocumentStoreAdapter implements DocumentStorePort {
  private readonly logger = new Logger(FirestoreDocumentStoreAdapter.name);

  constructor(
    private readonly httpService: HttpService,
    credentials: GoogleCredentialsService,
    @Inject(firestoreConfig.KEY)
    private readonly config: ConfigType<typeof firestoreConfig>,
    @Inject(gcpConfig.KEY)
    private readonly gcp: ConfigType<typeof gcpConfig>,
  ) {
    credentials.authorize(
      httpService,
      config.emulatorHost ? FIRESTORE_EMULATOR_TOKEN : undefined,
    );
  }

  private get documentsPath(): string {
    return `projects/${this.gcp.projectId}/databases/${this.config.database}/documents`;
  }

  private documentPath(collection: string, id: string): string {
    return `${this.documentsPath}/${collection}/${encodeURIComponent(id)}`;
  }

  private async request<T>(
    operation: string,
    source: Observable<AxiosResponse<T>>,
  ): Promise<AxiosResponse<T>> {
    return firstValueFrom(
      source.pipe(
        timeout(this.config.requestTimeoutMs),
        retry({
          count: this.config.maxRetries,
          delay: (error: unknown, retryCount: number) => {
            if (!isTransient(error)) {
              return throwError(() => error);
            }
            const delayMs =
              this.config.retryBaseDelayMs * 2 ** (retryCount - 1);
            this.logger.warn(
              `Firestore ${operation} failed, retry ${retryCount}/${this.config.maxRetries} in ${delayMs}ms`,
            );
            return timer(delayMs);
          },
        }),
        catchError((error: unknown) => {
          const status = isAxiosError(error)
            ? error.response?.status
            : undefined;
          const message = error instanceof Error ? error.message : String(error);
          return throwError(
            () =>
              new DocumentStoreError(
                operation,
                status,
                `Firestore ${operation} failed: ${message}`,
                { cause: error },
              ),
          );
        }),
      ),
    );
  }

  async get(collection: string, id: string): Promise<DocumentLookup> {
    try {
      const response = await this.request(
        "get",
        this.httpService.get<FirestoreDocument>(
          this.documentPath(collection, id),
        ),
      );
      return {
        found: true,
        document: { id, fields: decodeFields(response.data.fields) },
      };
    } catch (error) {
      if (error instanceof DocumentStoreError && error.status === 404) {
        return { found: false };
      }
      throw error;
    }
  }

  async query(
    collection: string,
    { where, orderBy, direction = "ASCENDING", limit }: DocumentQuery,
  ): Promise<StoredDocument[]> {
    const structuredQuery: StructuredQuery = {
      from: [{ collectionId: collection }],
    };

    const filters: FieldFilter[] = Object.entries(where).map(
      ([fieldPath, value]) => ({
        fieldFilter: {
          field: { fieldPath },
          op: "EQUAL",
          value: encodeValue(value, fieldPath),
        },
      }),
    );
    if (filters.length === 1) {
      structuredQuery.where = filters[0];
    } else if (filters.length > 1) {
      structuredQuery.where = { compositeFilter: { op: "AND", filters } };
    }

    if (orderBy) {
      structuredQuery.orderBy = [{ field: { fieldPath: orderBy }, direction }];
    }
    if (limit !== undefined) {
      structuredQuery.limit = limit;
    }

    const response = await this.request(
      "query",
      this.httpService.post<RunQueryResponseEntry[]>(
        `${this.documentsPath}:runQuery`,
        { structuredQuery },
      ),
    );

    const documents: StoredDocument[] = [];
    for (const entry of response.data) {
      if (entry.document) {
        documents.push({
          id: documentId(entry.document.name),
          fields: decodeFields(entry.document.fields),
        });
      }
    }

    this.logger.verbose(
      `Query on ${collection} returned ${documents.length} documents`,
    );
    return documents;
  }

  async upsert(
    collection: string,
    id: string,
    fields: DocumentFields,
  ): Promise<void> {
    await this.request(
      "upsert",
      this.httpService.patch<FirestoreDocument>(
        this.documentPath(collection, id),
        { fields: encodeFields(fields) },
      ),
    );
  }

  async create(
    collection: string,
    id: string,
    fields: DocumentFields,
  ): Promise<CreateOutcome> {
    try {
      await this.request(
        "create",
        this.httpService.post<FirestoreDocument>(
          `${this.documentsPath}/${collection}`,
          { fields: encodeFields(fields) },
          { params: { documentId: id } },
        ),
      );
      return { created: true };
    } catch (error) {
      if (error instanceof DocumentStoreError && error.status === 409) {
        return { created: false, reason: "already-exists" };
      }
      throw error;
    }
  }

  async delete(collection: string, id: string): Promise<void> {
    try {
      await this.request(
        "delete",
        this.httpService.delete(this.documentPath(collection, id)),
      );
    } catch (error) {
      if (error instanceof DocumentStoreError && error.status === 404) {
        return;
      }
      throw error;
    }
  }
}
