import { Module } from "@nestjs/common";

import { BigQueryModule } from "../bigquery/bigquery.module";
import { BigQueryTool } from "./bigquery.tools";

const toolProviders = [BigQueryTool];

@Module({
  imports: [BigQueryModule],
  providers: [...toolProviders],
  exports: [...toolProviders],
})
export class AiToolsModule {}
