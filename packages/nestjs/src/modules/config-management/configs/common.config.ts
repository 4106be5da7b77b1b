import { registerAs } from "@nestjs/config";

export default registerAs("common", () => ({
  nodeEnv: process.env.NODE_ENV,
  appEnv: process.env.APP_ENV ?? "production",
  port: Number.parseInt(process.env.PORT ?? "8080", 10),
}));
