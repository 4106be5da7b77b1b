import { registerAs } from "@nestjs/config";

export default registerAs("bigquery", () => ({
  maxRows: Number.parseInt(process.env.BIGQUERY_MAX_ROWS ?? "50", 10),
  queryTimeoutMs: Number.parseInt(
    process.env.BIGQUERY_QUERY_TIMEOUT_MS ?? "30000",
    10,
  ),
  maxPollAttempts: Number.parseInt(
    process.env.BIGQUERY_MAX_POLL_ATTEMPTS ?? "10",
    10,
  ),
}));
