import { describe, expect, it } from "vitest";
import { EnvValidationError, parseEnv } from "./env";

describe("parseEnv", () => {
  const BASE_ENV = {
    NODE_ENV: "development",
  };

  it("should apply defaults for optional variables", () => {
    const env = parseEnv(BASE_ENV);

    expect(env.PORT).toBe(8080);
    expect(env.NODE_ENV).toBe("development");
    expect(env.LOG_LEVEL).toBeUndefined();
    expect(env.BITMEX_NETWORK).toBe("mainnet");
    expect(env.BITMEX_SYMBOLS).toEqual(["XBTUSD"]);
    expect(env.THROTTLE_EPSILON).toBe(0.1);
    expect(env.EXECUTION_LOOKBACK_MS).toBe(86_400_000);
    expect(env.RECONCILE_INTERVAL_MS).toBe(30_000);
    expect(env.FILL_RATIO_INTERVAL_MS).toBe(300_000);
    expect(env.BITMEX_API_KEY).toBeUndefined();
  });

  it("should parse explicit values", () => {
    const env = parseEnv({
      ...BASE_ENV,
      PORT: "3000",
      LOG_LEVEL: "warn",
      BITMEX_NETWORK: "testnet",
      BITMEX_API_KEY: "test-key",
      BITMEX_API_SECRET: "test-secret",
      BITMEX_SYMBOLS: "XBTUSD, ETHUSD,,",
      THROTTLE_EPSILON: "0.5",
    });

    expect(env.PORT).toBe(3000);
    expect(env.LOG_LEVEL).toBe("warn");
    expect(env.BITMEX_NETWORK).toBe("testnet");
    expect(env.BITMEX_API_KEY).toBe("test-key");
    expect(env.BITMEX_API_SECRET).toBe("test-secret");
    expect(env.BITMEX_SYMBOLS).toEqual(["XBTUSD", "ETHUSD"]);
    expect(env.THROTTLE_EPSILON).toBe(0.5);
  });

  it("should fail when NODE_ENV is missing", () => {
    expect(() => parseEnv({})).toThrow(EnvValidationError);
  });

  it("should fail when PORT is not a number", () => {
    expect(() => parseEnv({ ...BASE_ENV, PORT: "abc" })).toThrow(EnvValidationError);
  });

  it("should fail when PORT is out of range", () => {
    expect(() => parseEnv({ ...BASE_ENV, PORT: "70000" })).toThrow(EnvValidationError);
  });

  it("should fail on an unknown network", () => {
    expect(() => parseEnv({ ...BASE_ENV, BITMEX_NETWORK: "devnet" })).toThrow(
      EnvValidationError,
    );
  });

  it("should fail when the symbol list is empty", () => {
    expect(() => parseEnv({ ...BASE_ENV, BITMEX_SYMBOLS: " , " })).toThrow(EnvValidationError);
  });

  it("should fail when THROTTLE_EPSILON is not positive", () => {
    expect(() => parseEnv({ ...BASE_ENV, THROTTLE_EPSILON: "0" })).toThrow(EnvValidationError);
  });

  it("should name the failing variable in the issues", () => {
    try {
      parseEnv({ ...BASE_ENV, LOG_LEVEL: "verbose" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvValidationError);
      if (error instanceof EnvValidationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^LOG_LEVEL: /);
      }
    }
  });
});
