import * as v from "valibot";
import { type Env, envSchema } from "./schema";

/**
 * Thrown when the process environment does not satisfy `envSchema`.
 * `issues` holds one "PATH: message" line per failed check.
 */
export class EnvValidationError extends Error {
  public override readonly name = "EnvValidationError";

  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed:\n  - ${issues.join("\n  - ")}`);
  }
}

export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    throw new EnvValidationError(
      result.issues.map((issue) => {
        const path = issue.path?.map((item) => String(item.key)).join(".") ?? "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return result.output;
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export type { Env, Network } from "./schema";
