import {
  type BaseToolkit,
  type StructuredToolInterface,
  tool,
} from "@langchain/core/tools";
import { Injectable, Logger, type OnModuleInit } from "@nestjs/common";
import { z } from "zod";

import { BigQueryService } from "../bigquery/services/bigquery.service";
import { type AiToolProvider, Tool } from "./ai-tools";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read-only BigQuery exploration tools. Every failure is returned as text so
 * the model can correct itself and try again.
 */
@Injectable()
@Tool()
export class BigQueryTool implements AiToolProvider, OnModuleInit {
  public tool!: BaseToolkit;
  private readonly logger = new Logger(BigQueryTool.name);

  constructor(private readonly bigQueryService: BigQueryService) {}

  async listDatasets(): Promise<string> {
    this.logger.log("Tool called: list_datasets");
    try {
      const datasets = await this.bigQueryService.listDatasets();
      if (datasets.length === 0) {
        return "No datasets available in the project.";
      }
      return JSON.stringify(datasets);
    } catch (error) {
      this.logger.error(`list_datasets error: ${errorMessage(error)}`);
      return `Error listing datasets: ${errorMessage(error)}`;
    }
  }

  async listTables(datasetId: string): Promise<string> {
    this.logger.log(`Tool called: list_tables(dataset_id=${datasetId})`);
    try {
      const tables = await this.bigQueryService.listTables(datasetId);
      if (tables.length === 0) {
        return `No tables in dataset ${datasetId}.`;
      }
      return JSON.stringify(tables);
    } catch (error) {
      this.logger.error(`list_tables error: ${errorMessage(error)}`);
      return `Error listing tables: ${errorMessage(error)}`;
    }
  }

  async getTableSchema(datasetId: string, tableId: string): Promise<string> {
    const tableRef = `${this.bigQueryService.projectId}.${datasetId}.${tableId}`;
    this.logger.log(`Tool called: get_table_schema(${tableRef})`);
    try {
      const columns = await this.bigQueryService.getTableSchema(
        datasetId,
        tableId,
      );
      return [
        `Schema of table ${tableRef}:`,
        ...columns.map(({ name, type, mode }) => `${name}: ${type} (${mode})`),
      ].join("\n");
    } catch (error) {
      this.logger.error(`get_table_schema error: ${errorMessage(error)}`);
      return `Error fetching schema: ${errorMessage(error)}`;
    }
  }

  async executeSql(query: string): Promise<string> {
    this.logger.log("Tool called: execute_sql");
    this.logger.debug(`SQL Query: ${query}`);

    const result = await this.bigQueryService.executeSql(query);
    if (!result.success) {
      return result.error;
    }

    const rows = JSON.stringify(result.rows);
    return result.truncated
      ? `Results (first ${result.rows.length} of ${result.totalRows} rows):\n${rows}`
      : `Results (${result.totalRows} rows):\n${rows}`;
  }

  onModuleInit() {
    const toolList: StructuredToolInterface[] = [
      tool(() => this.listDatasets(), {
        name: "list_datasets",
        description:
          "Lists the BigQuery datasets of the project. Use this first to learn how the data is organised.",
        schema: z.object({}),
      }),
      tool(({ dataset_id }) => this.listTables(dataset_id), {
        name: "list_tables",
        description: "Lists the tables of a BigQuery dataset.",
        schema: z.object({
          dataset_id: z.string().describe("Dataset to list the tables of"),
        }),
      }),
      tool(
        ({ dataset_id, table_id }) => this.getTableSchema(dataset_id, table_id),
        {
          name: "get_table_schema",
          description:
            "Returns the column names, types and modes of a BigQuery table. Always check the schema before writing SQL.",
          schema: z.object({
            dataset_id: z.string(),
            table_id: z.string(),
          }),
        },
      ),
      tool(({ query }) => this.executeSql(query), {
        name: "execute_sql",
        description:
          "Runs a read-only standard SQL query in BigQuery. Check table schemas with get_table_schema first.",
        schema: z.object({
          query: z.string().describe("A SELECT statement"),
        }),
      }),
    ];

    this.tool = {
      tools: toolList,
      getTools: () => toolList,
    };
  }
}
