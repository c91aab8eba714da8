/**
 * Reconciler module exports.
 */

// Types
export type { ReconcilerConfig, ReconcilerResult, StepOutcome } from "./types";

// Schemas
export { ReconcilerConfigSchema, hasFailures } from "./types";

// Functions
export { runReconcile } from "./reconcile";
export type { ReconcileDeps } from "./reconcile";
