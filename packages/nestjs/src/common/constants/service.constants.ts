export const SERVICE_NAME = "bq-analyst-agent";
export const SERVICE_VERSION = "2.0.0";

export const USER_AGENT = `${SERVICE_NAME}/${SERVICE_VERSION}`;
