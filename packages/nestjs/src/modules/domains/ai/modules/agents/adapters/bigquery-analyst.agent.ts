import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import type { StructuredToolInterface } from "@langchain/core/tools";
import { createReactAgent } from "@langchain/langgraph/prebuilt";
import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { DiscoveryService } from "@nestjs/core";

import agentConfig from "../../../../../config-management/configs/agent.config";
import {
  type CheckpointerPort,
  InjectCheckpointer,
} from "../../llm-storage/ports/checkpointer.port";
import {
  InjectPrimaryChatModel,
  type PrimaryChatModelPort,
} from "../../model-providers/ports/primary-model.port";
import { isAiToolProvider, Tool } from "../../tools/ai-tools";
import { GraphAgentPort } from "../ports/graph-agent.port";

export type AnalystGraph = ReturnType<typeof createReactAgent>;

@Injectable()
export class BigQueryAnalystAgentAdapter extends GraphAgentPort<AnalystGraph> {
  private readonly logger = new Logger(BigQueryAnalystAgentAdapter.name);
  private tools: StructuredToolInterface[] | undefined;
  private readonly systemPrompt: string;

  readonly agentId = "bigquery-analyst";
  protected graph: AnalystGraph | undefined;

  constructor(
    @InjectPrimaryChatModel() private primaryChatModel: PrimaryChatModelPort,
    private discoveryService: DiscoveryService,
    @InjectCheckpointer() private checkpointerAdapter: CheckpointerPort,
    @Inject(agentConfig.KEY) config: ConfigType<typeof agentConfig>,
  ) {
    super();
    this.systemPrompt = readFileSync(
      resolve(process.cwd(), config.systemPromptPath),
      "utf8",
    );
  }

  private getTools() {
    if (this.tools) {
      return this.tools;
    }

    this.tools = this.discoveryService
      .getProviders({ metadataKey: Tool.KEY })
      .map((wrapper) => wrapper.instance)
      .filter(isAiToolProvider)
      .reduce<StructuredToolInterface[]>((toolList, { tool }) => {
        // providers leave `tool` undefined when disabled
        if (!tool) {
          return toolList;
        }
        if ("tools" in tool) {
          toolList.push(...tool.getTools());
        } else {
          toolList.push(tool);
        }
        return toolList;
      }, []);

    return this.tools;
  }

  public getGraph(): AnalystGraph {
    if (this.graph) {
      return this.graph;
    }
    this.logger.debug("compiling the analyst graph");

    const tools = this.getTools();

    this.graph = createReactAgent({
      llm: this.primaryChatModel.model,
      tools,
      prompt: this.systemPrompt,
      checkpointSaver: this.checkpointerAdapter.instance,
    });

    this.logger.log(
      `Initialized BigQuery analyst agent with ${tools.length} tools: ${tools
        .map((t) => t.name)
        .join(", ")}`,
    );

    return this.graph;
  }
}
