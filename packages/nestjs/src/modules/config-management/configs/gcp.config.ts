import { registerAs } from "@nestjs/config";

export default registerAs("gcp", () => ({
  projectId: process.env.GOOGLE_CLOUD_PROJECT ?? "",
  // BigQuery job location
  location: process.env.GOOGLE_CLOUD_LOCATION ?? "US",
}));
