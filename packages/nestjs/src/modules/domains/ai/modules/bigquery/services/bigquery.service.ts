import { HttpService } from "@nestjs/axios";
import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { type AxiosResponse, isAxiosError } from "axios";
import { firstValueFrom, type Observable, timeout } from "rxjs";

import bigqueryConfig from "../../../../../config-management/configs/bigquery.config";
import gcpConfig from "../../../../../config-management/configs/gcp.config";
import { GoogleCredentialsService } from "../../../../../google-cloud/services/google-credentials.service";
import type {
  ColumnSchema,
  DatasetListResponse,
  QueryRequest,
  QueryResponse,
  SqlExecutionResult,
  TableListResponse,
  TableResponse,
} from "./bigquery.types";
import { convertRow } from "./row-converter";
import { findForbiddenKeyword } from "./sql-guard";

// Headroom for BigQuery to answer on its own before the client gives up
const HTTP_TIMEOUT_MARGIN_MS = 5000;

function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (
      typeof data === "object" &&
      data !== null &&
      "error" in data &&
      typeof data.error === "object" &&
      data.error !== null &&
      "message" in data.error &&
      typeof data.error.message === "string"
    ) {
      return data.error.message;
    }
  }
  return error instanceof Error ? error.message : "Unknown error occurred";
}

@Injectable()
export class BigQueryService {
  private readonly logger = new Logger(BigQueryService.name);

  constructor(
    private readonly httpService: HttpService,
    credentials: GoogleCredentialsService,
    @Inject(bigqueryConfig.KEY)
    private readonly config: ConfigType<typeof bigqueryConfig>,
    @Inject(gcpConfig.KEY)
    private readonly gcp: ConfigType<typeof gcpConfig>,
  ) {
    credentials.authorize(httpService);
  }

  get projectId(): string {
    return this.gcp.projectId;
  }

  private async send<T>(source: Observable<AxiosResponse<T>>): Promise<T> {
    const response = await firstValueFrom(
      source.pipe(
        timeout(this.config.queryTimeoutMs + HTTP_TIMEOUT_MARGIN_MS),
      ),
    );
    return response.data;
  }

  async listDatasets(): Promise<string[]> {
    const datasets: string[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.send(
        this.httpService.get<DatasetListResponse>(
          `projects/${this.projectId}/datasets`,
          { params: { pageToken } },
        ),
      );
      for (const dataset of page.datasets ?? []) {
        datasets.push(dataset.datasetReference.datasetId);
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    this.logger.log(`Found ${datasets.length} datasets`);
    return datasets;
  }

  async listTables(datasetId: string): Promise<string[]> {
    const tables: string[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.send(
        this.httpService.get<TableListResponse>(
          `projects/${this.projectId}/datasets/${encodeURIComponent(datasetId)}/tables`,
          { params: { pageToken } },
        ),
      );
      for (const table of page.tables ?? []) {
        tables.push(table.tableReference.tableId);
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    this.logger.log(`Found ${tables.length} tables in ${datasetId}`);
    return tables;
  }

  async getTableSchema(
    datasetId: string,
    tableId: string,
  ): Promise<ColumnSchema[]> {
    const table = await this.send(
      this.httpService.get<TableResponse>(
        `projects/${this.projectId}/datasets/${encodeURIComponent(datasetId)}/tables/${encodeURIComponent(tableId)}`,
      ),
    );

    return (table.schema?.fields ?? []).map((field) => ({
      name: field.name,
      type: field.type,
      mode: field.mode ?? "NULLABLE",
    }));
  }

  /**
   * Runs a read-only standard SQL query. Failures are returned, not thrown.
   */
  async executeSql(query: string): Promise<SqlExecutionResult> {
    const blockedKeyword = findForbiddenKeyword(query);
    if (blockedKeyword) {
      this.logger.warn(`Blocked forbidden SQL operation: ${blockedKeyword}`);
      return {
        success: false,
        blockedKeyword,
        error: `Security error: the ${blockedKeyword} operation is not allowed. Only read-only SELECT queries may be run.`,
      };
    }

    const startTime = Date.now();
    const { maxRows, queryTimeoutMs, maxPollAttempts } = this.config;

    try {
      const request: QueryRequest = {
        query,
        useLegacySql: false,
        maxResults: maxRows,
        timeoutMs: queryTimeoutMs,
        location: this.gcp.location,
      };
      this.logger.debug("Executing SQL via BigQuery API v2", { query });

      let response = await this.send(
        this.httpService.post<QueryResponse>(
          `projects/${this.projectId}/queries`,
          request,
        ),
      );

      let polls = 0;
      while (!response.jobComplete) {
        const jobReference = response.jobReference;
        if (!jobReference) {
          throw new Error("BigQuery returned an unfinished job without a reference");
        }
        if (polls >= maxPollAttempts) {
          return {
            success: false,
            error: `SQL execution failed: job ${jobReference.jobId} did not complete after ${polls} polls`,
          };
        }
        polls += 1;

        response = await this.send(
          this.httpService.get<QueryResponse>(
            `projects/${this.projectId}/queries/${jobReference.jobId}`,
            {
              params: {
                location: jobReference.location ?? this.gcp.location,
                maxResults: maxRows,
                timeoutMs: queryTimeoutMs,
              },
            },
          ),
        );
      }

      const fields = response.schema?.fields ?? [];
      const rows = (response.rows ?? [])
        .slice(0, maxRows)
        .map((row) => convertRow(fields, row));
      const totalRows = response.totalRows
        ? Number.parseInt(response.totalRows, 10)
        : rows.length;

      this.logger.log(
        `SQL execution completed successfully in ${Date.now() - startTime}ms`,
        { totalRows },
      );

      return {
        success: true,
        rows,
        totalRows,
        truncated: totalRows > rows.length,
      };
    } catch (error) {
      const message = describeError(error);
      this.logger.error("SQL execution failed", {
        error: message,
        executionTime: Date.now() - startTime,
      });
      return { success: false, error: `SQL execution failed: ${message}` };
    }
  }
}
