/**
 * Reconciler types, schemas and config.
 */

import * as v from "valibot";

// --- Config ---

/**
 * Configuration for periodic reconciliation of one market.
 */
export interface ReconcilerConfig {
  symbol: string;
  /** Whether signed endpoints can be called; account steps are skipped otherwise */
  authenticated: boolean;
  /** Rebuild the market's stream when it has closed */
  superviseStream: boolean;
}

export const ReconcilerConfigSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  authenticated: v.boolean(),
  superviseStream: v.optional(v.boolean(), true),
});

// --- Result ---

/**
 * Outcome of one step; a failed step does not stop the ones after it.
 */
export type StepOutcome = "OK" | "SKIPPED" | "FAILED";

/**
 * Result of a reconciliation run.
 */
export interface ReconcilerResult {
  symbol: string;
  stream: StepOutcome | "REBUILT";
  executions: StepOutcome;
  orders: StepOutcome;
  account: StepOutcome;
  /** Executions reconciled by this run */
  newExecutions: number;
  timestamp: Date;
}

/** True when any step of the run failed */
export const hasFailures = (result: ReconcilerResult): boolean =>
  [result.stream, result.executions, result.orders, result.account].includes("FAILED");
