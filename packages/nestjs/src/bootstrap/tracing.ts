import * as CallbackManagerModule from "@langchain/core/callbacks/manager";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { LangChainInstrumentation } from "@traceloop/instrumentation-langchain";

import { SERVICE_NAME } from "../common/constants/service.constants";

const traceExporter = new OTLPTraceExporter();

// LangChain is instrumented by hand so agent runs and tool calls get spans
const langchainInstrumentation = new LangChainInstrumentation({});
langchainInstrumentation.manuallyInstrument({
  callbackManagerModule: CallbackManagerModule,
});

const otelSDK = new NodeSDK({
  serviceName: SERVICE_NAME,
  spanProcessors: [new BatchSpanProcessor(traceExporter)],
  contextManager: new AsyncLocalStorageContextManager(),
  instrumentations: [getNodeAutoInstrumentations(), langchainInstrumentation],
});

export default otelSDK;
