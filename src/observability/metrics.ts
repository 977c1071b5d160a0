import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface ModelUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  pipelineLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  modelLatency: LatencySummary;
  modelUsage: ModelUsageSummary;
  pipelineOutcomes: Record<string, number>;
  serviceFallbacks: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  pipelineLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  modelLatency: createLatencySummary(),
  modelUsage: {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  },
  pipelineOutcomes: {},
  serviceFallbacks: {},
  errorRates: {}
});

let state: MetricsState = createState();

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const increment = (counters: Record<string, number>, key: string): void => {
  counters[key] = (counters[key] ?? 0) + 1;
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordPipelineLatency = (durationMs: number): void => {
  recordLatency(state.pipelineLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordModelLatency = (durationMs: number): void => {
  recordLatency(state.modelLatency, durationMs);
};

export const recordModelUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.modelUsage.promptTokens += usage.promptTokens ?? 0;
  state.modelUsage.completionTokens += usage.completionTokens ?? 0;
  state.modelUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordPipelineOutcome = (terminalState: string): void => {
  increment(state.pipelineOutcomes, terminalState);
};

export const recordServiceFallback = (service: string): void => {
  increment(state.serviceFallbacks, service);
};

export const recordErrorRate = (key: string): void => {
  increment(state.errorRates, key);
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  pipeline_latency: serializeLatency(state.pipelineLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  model_latency: serializeLatency(state.modelLatency),
  model_usage: { ...state.modelUsage },
  pipeline_outcomes: { ...state.pipelineOutcomes },
  service_fallbacks: { ...state.serviceFallbacks },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

/** A caller-supplied `x-request-id` wins over Fastify's generated id. */
export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", resolveRequestId(request));
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
