import {
  context,
  trace,
  SpanStatusCode,
  type Span,
  type Tracer,
  type SpanOptions,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  InMemorySpanExporter,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { TracingConfig } from "../config/types.js";
import { RECSWEEP_VERSION } from "../config/constants.js";

let tracer: Tracer | null = null;
let provider: NodeTracerProvider | null = null;
let memoryExporter: InMemorySpanExporter | null = null;
let isInitialized = false;

export const TRACING_SERVICE_NAME = "recsweep";

export const SPAN_NAMES = {
  SWEEP: "recsweep.sweep",
  CONFIGURATION: "recsweep.configuration",
  RUN_PLAIN: "recsweep.run.plain",
  RUN_SYSCALLS: "recsweep.run.syscalls",
  RUN_COUNTERS: "recsweep.run.counters",
} as const;

export function isTracingEnabled(): boolean {
  return isInitialized && tracer !== null;
}

export function getMemoryExporter(): InMemorySpanExporter | null {
  return memoryExporter;
}

export function initTracing(config: TracingConfig): void {
  if (isInitialized) {
    return;
  }

  if (!config.enabled) {
    isInitialized = true;
    return;
  }

  const serviceName = config.serviceName ?? TRACING_SERVICE_NAME;
  const resource = Resource.default().merge(
    new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
    }),
  );

  provider = new NodeTracerProvider({ resource });

  let exporter: SpanExporter;
  if (config.exporterType === "memory") {
    memoryExporter = new InMemorySpanExporter();
    exporter = memoryExporter;
  } else {
    exporter = new ConsoleSpanExporter();
  }
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));

  provider.register();
  tracer = trace.getTracer(serviceName, RECSWEEP_VERSION);
  isInitialized = true;
}

export function shutdownTracing(): Promise<void> {
  if (provider) {
    return provider.shutdown();
  }
  return Promise.resolve();
}

export function flushTracing(): Promise<void> {
  if (provider) {
    return provider.forceFlush();
  }
  return Promise.resolve();
}

export function getTracer(): Tracer {
  if (!tracer) {
    return trace.getTracer(TRACING_SERVICE_NAME, RECSWEEP_VERSION);
  }
  return tracer;
}

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

function definedAttributes(
  attrs: SpanAttributes,
): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export function startSpan(
  name: string,
  attributes?: SpanAttributes,
  options?: SpanOptions,
): { span: Span; end: (error?: Error) => void } {
  const span = getTracer().startSpan(name, {
    ...options,
    attributes: attributes ? definedAttributes(attributes) : undefined,
  });

  const end = (error?: Error): void => {
    if (error) {
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }
    span.end();
  };

  return { span, end };
}

/** Runs fn with span active, so spans started inside it become children. */
export function runInSpanContext<T>(span: Span, fn: () => T): T {
  return context.with(trace.setSpan(context.active(), span), fn);
}

export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: SpanAttributes,
  options?: SpanOptions,
): T {
  const { span, end } = startSpan(name, attributes, options);

  try {
    const result = runInSpanContext(span, () => fn(span));
    end();
    return result;
  } catch (error) {
    end(error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

export function setSpanAttributes(
  span: Span,
  attributes: SpanAttributes,
): void {
  span.setAttributes(definedAttributes(attributes));
}

export async function resetTracingForTest(): Promise<void> {
  if (provider) {
    await provider.shutdown();
  }
  trace.disable();
  context.disable();
  tracer = null;
  provider = null;
  memoryExporter = null;
  isInitialized = false;
}
