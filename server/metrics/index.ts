import type { Express } from "express";
import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client";

export type CollatzOutcome = "ok" | "truncated" | "invalid" | "overflow" | "error";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total HTTP requests processed by Express",
  labelNames: ["method", "route", "status"],
  registers: [registry],
});

const httpRequestDuration = new Histogram({
  name: "http_request_duration_ms",
  help: "HTTP request duration in milliseconds",
  labelNames: ["method", "route", "status"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});

const collatzComputationsTotal = new Counter({
  name: "collatz_computations_total",
  help: "Collatz computations grouped by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

const collatzSequenceLength = new Histogram({
  name: "collatz_sequence_length",
  help: "Number of values returned per Collatz computation",
  buckets: [1, 10, 25, 50, 100, 200, 500, 1000, 5000],
  registers: [registry],
});

export const metrics = {
  observeHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const cleanRoute = route || "unknown";
    const status = Number.isFinite(statusCode) ? String(statusCode) : "0";
    httpRequestsTotal.inc({ method: method || "GET", route: cleanRoute, status });
    httpRequestDuration.observe({ method: method || "GET", route: cleanRoute, status }, durationMs);
  },
  recordCollatz(outcome: CollatzOutcome, length?: number): void {
    collatzComputationsTotal.inc({ outcome });
    if (length !== undefined && Number.isFinite(length) && length > 0) {
      collatzSequenceLength.observe(length);
    }
  },
};

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
