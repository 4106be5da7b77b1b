export * from "./bigquery-analyst.agent";
