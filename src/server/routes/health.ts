import { Hono } from "hono";

import type { ConnectorStatus, StreamState } from "@/adapters";

type CheckStatus = "healthy" | "unhealthy";

export interface HealthDeps {
  getStatus: () => ConnectorStatus;
  /** Markets whose streams must be live */
  symbols: string[];
}

const checkStreams = (
  status: ConnectorStatus,
  symbols: string[],
): { status: CheckStatus; streams: Record<string, StreamState | "MISSING"> } => {
  const streams: Record<string, StreamState | "MISSING"> = {};
  for (const symbol of symbols) {
    streams[symbol] = status.streams[symbol]?.state ?? "MISSING";
  }
  const live = Object.values(streams).every((state) => state === "STREAMING");
  return { status: live ? "healthy" : "unhealthy", streams };
};

const checkCircuit = (status: ConnectorStatus): { status: CheckStatus; state: string } => ({
  status: status.circuit === "OPEN" ? "unhealthy" : "healthy",
  state: status.circuit,
});

export const createHealthRoute = (deps: HealthDeps): Hono => {
  const health = new Hono();

  health.get("/", (c) => {
    const status = deps.getStatus();
    const checks = {
      streams: checkStreams(status, deps.symbols),
      circuit: checkCircuit(status),
    };

    const allHealthy = Object.values(checks).every((check) => check.status === "healthy");

    return c.json(
      {
        status: allHealthy ? "healthy" : "unhealthy",
        timestamp: new Date().toISOString(),
        checks,
      },
      allHealthy ? 200 : 503,
    );
  });

  return health;
};
