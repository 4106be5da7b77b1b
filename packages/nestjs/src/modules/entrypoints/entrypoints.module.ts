import { Module } from "@nestjs/common";

import { HttpEntryPointModule } from "./modules/http/http.module";

@Module({
  imports: [HttpEntryPointModule],
})
export class EntrypointsModule {}
