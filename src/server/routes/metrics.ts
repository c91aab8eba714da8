import { Hono } from "hono";

import type { ConnectorStatus } from "@/adapters";
import type { WorkerState } from "@/worker/state";

/** Request durations kept for the histogram */
const MAX_DURATIONS = 1000;

const DURATION_BUCKETS_MS: [label: string, upperMs: number][] = [
  ["0.1", 100],
  ["0.5", 500],
  ["1.0", 1000],
];

export interface HttpMetrics {
  incrementRequests: () => void;
  recordDuration: (durationMs: number) => void;
  snapshot: () => { requestsTotal: number; durationsMs: readonly number[] };
}

export const createHttpMetrics = (): HttpMetrics => {
  let requestsTotal = 0;
  const durationsMs: number[] = [];

  return {
    incrementRequests: () => {
      requestsTotal++;
    },
    recordDuration: (durationMs) => {
      durationsMs.push(durationMs);
      if (durationsMs.length > MAX_DURATIONS) {
        durationsMs.shift();
      }
    },
    snapshot: () => ({ requestsTotal, durationsMs }),
  };
};

export interface MetricsSources {
  http: HttpMetrics;
  getStatus: () => ConnectorStatus;
  getState?: () => Readonly<WorkerState>;
}

type Sample = [labels: Record<string, string>, value: number];

const formatValue = (value: number): string => (Number.isNaN(value) ? "NaN" : String(value));

const formatLabels = (labels: Record<string, string>): string => {
  const entries = Object.entries(labels);
  if (entries.length === 0) return "";
  return `{${entries.map(([key, value]) => `${key}="${value.replace(/["\\\n]/g, "\\$&")}"`).join(",")}}`;
};

const block = (name: string, type: "counter" | "gauge", help: string, samples: Sample[]): string =>
  [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} ${type}`,
    ...samples.map(([labels, value]) => `${name}${formatLabels(labels)} ${formatValue(value)}`),
  ].join("\n");

/** Prometheus text exposition of HTTP, transport, stream and worker metrics */
export const renderMetrics = (sources: MetricsSources): string => {
  const { requestsTotal, durationsMs } = sources.http.snapshot();
  const status = sources.getStatus();
  const { transport, rateLimit } = status;
  const streams = Object.entries(status.streams);

  const blocks = [
    block("http_requests_total", "counter", "Total number of HTTP requests", [
      [{}, requestsTotal],
    ]),
    [
      "# HELP http_request_duration_seconds HTTP request duration in seconds",
      "# TYPE http_request_duration_seconds histogram",
      ...DURATION_BUCKETS_MS.map(
        ([label, upperMs]) =>
          `http_request_duration_seconds_bucket{le="${label}"} ${durationsMs.filter((d) => d < upperMs).length}`,
      ),
      `http_request_duration_seconds_bucket{le="+Inf"} ${durationsMs.length}`,
    ].join("\n"),
    block("rest_requests_total", "counter", "REST requests sent to the exchange", [
      [{}, transport.requests],
    ]),
    block("rest_responses_total", "counter", "REST request outcomes", [
      [{ outcome: "success" }, transport.successes],
      [{ outcome: "transient_error" }, transport.transientErrors],
      [{ outcome: "client_error" }, transport.clientErrors],
      [{ outcome: "network_error" }, transport.networkErrors],
      [{ outcome: "invalid_response" }, transport.invalidResponses],
    ]),
    block("rate_limit_remaining", "gauge", "Request quota remaining in the current window", [
      [{}, rateLimit.remaining ?? Number.NaN],
    ]),
    block("throttle_sleep_seconds_total", "counter", "Time spent in the self-throttle", [
      [{}, transport.throttleSleepMs / 1000],
    ]),
    block("circuit_open", "gauge", "Whether the REST circuit breaker is open", [
      [{}, status.circuit === "OPEN" ? 1 : 0],
    ]),
    block(
      "book_stream_up",
      "gauge",
      "Whether the book stream is STREAMING",
      streams.map(([symbol, stats]) => [{ symbol }, stats.state === "STREAMING" ? 1 : 0]),
    ),
    block(
      "book_levels",
      "gauge",
      "Price levels held by the book stream",
      streams.map(([symbol, stats]) => [{ symbol }, stats.levels]),
    ),
    block(
      "book_messages_total",
      "counter",
      "Book data messages applied",
      streams.map(([symbol, stats]) => [{ symbol }, stats.messages]),
    ),
  ];

  const state = sources.getState?.();
  if (state) {
    blocks.push(
      block(
        "executions_total",
        "counter",
        "Executions reconciled",
        [...state.symbols].map(([symbol, s]) => [{ symbol }, s.executionCount]),
      ),
      block(
        "connector_events_total",
        "counter",
        "Connector events by type",
        Object.entries(state.eventCounts).map(([type, count]) => [{ type }, count]),
      ),
      block("quote_fill_ratio", "gauge", "Latest seven-day quote fill ratio", [
        [{}, state.fillRatio[0] ?? Number.NaN],
      ]),
    );
  }

  return blocks.join("\n\n");
};

export const createMetricsRoute = (sources: MetricsSources): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) =>
    c.text(renderMetrics(sources), 200, {
      "Content-Type": "text/plain; version=0.0.4",
    }),
  );

  return metrics;
};
