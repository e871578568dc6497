import type { FastifyInstance, FastifyRequest } from "fastify";

export type QueryPath = "direct" | "primary" | "alternatives" | "fallback";

type LatencyName = "request" | "retrieval" | "generation";

export interface TokenUsageTotals {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LatencySnapshot {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

class LatencyTracker {
  private count = 0;
  private totalMs = 0;
  private minMs = Number.POSITIVE_INFINITY;
  private maxMs = 0;

  record(durationMs: number): void {
    const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
    this.count += 1;
    this.totalMs += duration;
    this.minMs = Math.min(this.minMs, duration);
    this.maxMs = Math.max(this.maxMs, duration);
  }

  snapshot(): LatencySnapshot {
    if (this.count === 0) {
      return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
    }
    return {
      count: this.count,
      avgMs: round2(this.totalMs / this.count),
      minMs: round2(this.minMs),
      maxMs: round2(this.maxMs)
    };
  }
}

const freshState = () => ({
  latency: {
    request: new LatencyTracker(),
    retrieval: new LatencyTracker(),
    generation: new LatencyTracker()
  } satisfies Record<LatencyName, LatencyTracker>,
  usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } satisfies TokenUsageTotals,
  errors: new Map<string, number>(),
  paths: { direct: 0, primary: 0, alternatives: 0, fallback: 0 } satisfies Record<QueryPath, number>
});

// Process-wide counters exposed on GET /metrics.
let state = freshState();

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export const recordRequestLatency = (durationMs: number): void => state.latency.request.record(durationMs);

export const recordRetrievalLatency = (durationMs: number): void => state.latency.retrieval.record(durationMs);

export const recordGenerationLatency = (durationMs: number): void => state.latency.generation.record(durationMs);

export const recordOpenAIUsage = (usage: Partial<TokenUsageTotals>): void => {
  state.usage.promptTokens += usage.promptTokens ?? 0;
  state.usage.completionTokens += usage.completionTokens ?? 0;
  state.usage.totalTokens += usage.totalTokens ?? 0;
};

export const recordErrorRate = (key: string): void => {
  state.errors.set(key, (state.errors.get(key) ?? 0) + 1);
};

export const recordQueryPath = (path: QueryPath): void => {
  state.paths[path] += 1;
};

export const getMetricsSnapshot = () => ({
  request_latency: state.latency.request.snapshot(),
  retrieval_latency: state.latency.retrieval.snapshot(),
  generation_latency: state.latency.generation.snapshot(),
  openai_usage: { ...state.usage },
  error_rates: Object.fromEntries(state.errors),
  query_paths: { ...state.paths }
});

export const resetMetrics = (): void => {
  state = freshState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

/** Times every request and counts 4xx/5xx responses as `http_<status>`. */
export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request, reply) => {
    requestStartTimes.set(request, performance.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestStartTimes.get(request);
    recordRequestLatency(startedAt === undefined ? 0 : performance.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
