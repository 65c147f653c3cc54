import { describe, test, expect } from "vitest";
import type { Logger } from "pino";
import { ConfigurationError } from "../lib/errors.ts";
import { createDbClient } from "./client.ts";

function createMockLogger(): Logger {
  return {
    warn: () => {},
    info: () => {},
    debug: () => {},
    error: () => {},
    child: () => createMockLogger(),
  } as unknown as Logger;
}

describe("createDbClient", () => {
  test("throws ConfigurationError without a connection string", () => {
    expect(() => createDbClient({ connectionString: undefined, logger: createMockLogger() })).toThrow(
      ConfigurationError,
    );
    expect(() => createDbClient({ connectionString: "", logger: createMockLogger() })).toThrow(
      "DATABASE_URL is not set",
    );
  });
});
