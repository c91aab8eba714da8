export { EnvValidationError, getEnv, parseEnv } from "./env";
export type { Env, Network } from "./env";
