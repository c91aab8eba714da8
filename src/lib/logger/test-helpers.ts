import { vi } from "vitest";

import type { Logger } from "./logger";

/** Logger whose methods are spies; `child` returns the same logger */
export const createSpyLogger = () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn((): Logger => logger),
  } satisfies Logger;
  return logger;
};
