import type {
  BaseToolkit,
  StructuredToolInterface,
} from "@langchain/core/tools";
import { DiscoveryService } from "@nestjs/core";

export type AiToolProvider = {
  tool: StructuredToolInterface | BaseToolkit | undefined;
};

export const Tool = DiscoveryService.createDecorator();

export function isAiToolProvider(instance: unknown): instance is AiToolProvider {
  return typeof instance === "object" && instance !== null && "tool" in instance;
}
