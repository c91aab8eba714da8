/**
 * Signed, self-throttled REST transport.
 *
 * Requests run one at a time through a single-concurrency queue. After each
 * response the transport sleeps for the quota-derived throttle delay before
 * releasing the queue, so the sleep blocks every later caller. `request`
 * never throws: failures come back as a typed result.
 */

import PQueue from "p-queue";
import * as v from "valibot";

import type { Logger } from "@/lib/logger";
import {
  CircuitOpenError,
  createCircuitBreaker,
  createQuotaThrottle,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  type RateLimitState,
} from "@/lib/rate-limiter";

import { ExchangeError, type ExchangeErrorCode } from "../errors";
import type { TransportMetrics } from "../types";
import { ErrorBodySchema } from "./schemas";
import { createNonceSource, createSignedHeaders, type Credentials } from "./signer";

export const EXCHANGE = "bitmex";

export type HttpVerb = "GET" | "POST" | "PUT" | "DELETE";

export type RequestParams = Record<string, string | number | boolean | undefined>;

export interface RestRequest<TSchema extends v.GenericSchema> {
  verb: HttpVerb;
  /** Endpoint relative to the API base, e.g. "order" */
  path: string;
  params?: RequestParams;
  schema: TSchema;
  signed?: boolean;
}

export type RestFailure =
  | { ok: false; kind: "TRANSIENT_SERVER_ERROR"; status: number }
  | {
      ok: false;
      kind: "CLIENT_ERROR";
      /** null when the request was refused before reaching the network */
      status: number | null;
      error: { name: string; message: string };
    }
  | { ok: false; kind: "NETWORK_ERROR"; status: null; message: string; cause: unknown }
  | { ok: false; kind: "INVALID_RESPONSE"; status: number; message: string };

export type RestResult<T> = { ok: true; status: number; payload: T } | RestFailure;

export interface Transport {
  request: <TSchema extends v.GenericSchema>(
    req: RestRequest<TSchema>,
  ) => Promise<RestResult<v.InferOutput<TSchema>>>;
  hasCredentials: () => boolean;
  getRateLimit: () => RateLimitState;
  getMetrics: () => TransportMetrics;
  getCircuitState: () => CircuitBreakerState;
}

export interface TransportConfig {
  /** API base including its path prefix, e.g. https://www.bitmex.com/api/v1 */
  baseUrl: string;
  credentials?: Credentials;
  throttleEpsilon: number;
  requestTimeoutMs?: number;
  circuitBreaker?: CircuitBreakerConfig;
  logger: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_STATUSES = new Set([500, 502, 504]);

export const isTransientStatus = (status: number): boolean => TRANSIENT_STATUSES.has(status);

/** Query string with undefined values dropped, in insertion order */
export const buildQuery = (params: RequestParams | undefined): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : "";
};

const definedParams = (params: RequestParams | undefined): Record<string, string | number | boolean> => {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
};

const decodeClientError = (
  status: number,
  statusText: string,
  text: string,
): { name: string; message: string } => {
  try {
    const parsed = v.safeParse(ErrorBodySchema, JSON.parse(text));
    if (parsed.success) {
      return parsed.output.error;
    }
  } catch {
    // Non-JSON error bodies fall through to the status line
  }
  return { name: "HTTPError", message: `${status} ${statusText}`.trim() };
};

const summarizeIssues = (issues: readonly v.BaseIssue<unknown>[]): string =>
  issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

export const createTransport = (config: TransportConfig): Transport => {
  const {
    baseUrl,
    credentials,
    throttleEpsilon,
    requestTimeoutMs = 10_000,
    logger,
    now = Date.now,
    sleep,
  } = config;

  const base = baseUrl.replace(/\/$/, "");
  const prefix = new URL(base).pathname.replace(/\/$/, "");
  const signHeaders = credentials
    ? createSignedHeaders(credentials, createNonceSource(now))
    : undefined;

  const queue = new PQueue({ concurrency: 1 });
  const throttle = createQuotaThrottle({ epsilon: throttleEpsilon, now, sleep });
  // Only network failures reach the breaker; HTTP statuses resolve normally
  const breaker = createCircuitBreaker(
    config.circuitBreaker ?? { failureThreshold: 5, resetTimeoutMs: 30_000 },
  );
  breaker.onStateChange((state) => {
    const log = state === "OPEN" ? logger.warn : logger.info;
    log("REST circuit breaker state change", { state });
  });

  const metrics: TransportMetrics = {
    requests: 0,
    successes: 0,
    transientErrors: 0,
    clientErrors: 0,
    networkErrors: 0,
    invalidResponses: 0,
    throttleSleepMs: 0,
  };

  const interpret = async <TSchema extends v.GenericSchema>(
    response: Response,
    schema: TSchema,
  ): Promise<RestResult<v.InferOutput<TSchema>>> => {
    const { status } = response;
    // Drain every body, transient failures included
    const text = await response.text();

    if (isTransientStatus(status)) {
      metrics.transientErrors++;
      return { ok: false, kind: "TRANSIENT_SERVER_ERROR", status };
    }

    if (!response.ok) {
      metrics.clientErrors++;
      return {
        ok: false,
        kind: "CLIENT_ERROR",
        status,
        error: decodeClientError(status, response.statusText, text),
      };
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      metrics.invalidResponses++;
      return { ok: false, kind: "INVALID_RESPONSE", status, message: "Response body is not JSON" };
    }

    const parsed = v.safeParse(schema, body);
    if (!parsed.success) {
      metrics.invalidResponses++;
      return {
        ok: false,
        kind: "INVALID_RESPONSE",
        status,
        message: summarizeIssues(parsed.issues),
      };
    }

    metrics.successes++;
    return { ok: true, status, payload: parsed.output };
  };

  const execute = async <TSchema extends v.GenericSchema>(
    req: RestRequest<TSchema>,
  ): Promise<RestResult<v.InferOutput<TSchema>>> => {
    const { verb, path, params, schema, signed = false } = req;

    if (signed && !signHeaders) {
      metrics.clientErrors++;
      return {
        ok: false,
        kind: "CLIENT_ERROR",
        status: null,
        error: { name: "MissingCredentials", message: `${verb} ${path} requires API credentials` },
      };
    }

    const isRead = verb === "GET";
    const query = isRead ? buildQuery(params) : "";
    const body = isRead ? "" : JSON.stringify(definedParams(params));
    const requestPath = `${prefix}/${path}${query}`;

    const headers: Record<string, string> = {
      accept: "application/json",
      ...(isRead ? {} : { "content-type": "application/json" }),
      ...(signed && signHeaders ? signHeaders(verb, requestPath, body) : {}),
    };

    metrics.requests++;
    const startedAt = now();

    let response: Response;
    try {
      response = await breaker.execute(() =>
        fetch(`${base}/${path}${query}`, {
          method: verb,
          headers,
          ...(isRead ? {} : { body }),
          signal: AbortSignal.timeout(requestTimeoutMs),
        }),
      );
    } catch (error) {
      metrics.networkErrors++;
      const message =
        error instanceof CircuitOpenError
          ? error.message
          : `Network failure on ${verb} ${path}: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn("REST request failed before a response", { verb, path, message });
      return { ok: false, kind: "NETWORK_ERROR", status: null, message, cause: error };
    }

    throttle.observe(response.headers);
    const result = await interpret(response, schema);

    logger.debug("REST request completed", {
      verb,
      path,
      status: response.status,
      outcome: result.ok ? "ok" : result.kind,
      durationMs: now() - startedAt,
      remaining: throttle.getState().remaining,
    });

    metrics.throttleSleepMs += await throttle.wait();
    return result;
  };

  return {
    request: (req) => queue.add(() => execute(req), { throwOnTimeout: true }),
    hasCredentials: () => signHeaders !== undefined,
    getRateLimit: throttle.getState,
    getMetrics: () => ({ ...metrics }),
    getCircuitState: breaker.getState,
  };
};

/** Human-readable summary of a failed request */
export const describeFailure = (failure: RestFailure): string => {
  switch (failure.kind) {
    case "TRANSIENT_SERVER_ERROR":
      return `Server unavailable (HTTP ${failure.status})`;
    case "CLIENT_ERROR":
      return `${failure.error.name}: ${failure.error.message}`;
    case "NETWORK_ERROR":
    case "INVALID_RESPONSE":
      return failure.message;
  }
};

export const failureCode = (failure: RestFailure): ExchangeErrorCode => {
  switch (failure.kind) {
    case "TRANSIENT_SERVER_ERROR":
      return "SERVER_UNAVAILABLE";
    case "CLIENT_ERROR":
      return failure.status === 401 || failure.status === 403 || failure.status === null
        ? "AUTHENTICATION_FAILED"
        : "REQUEST_REJECTED";
    case "NETWORK_ERROR":
      return "NETWORK_ERROR";
    case "INVALID_RESPONSE":
      return "INVALID_RESPONSE";
  }
};

/**
 * Payload of a successful result; throws `ExchangeError` otherwise.
 *
 * @param context - What was being requested, prefixed to the error message
 */
export const unwrap = <T>(result: RestResult<T>, context: string): T => {
  if (result.ok) {
    return result.payload;
  }
  throw new ExchangeError(
    `${context}: ${describeFailure(result)}`,
    failureCode(result),
    EXCHANGE,
    result,
  );
};
