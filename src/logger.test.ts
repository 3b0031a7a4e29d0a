import { describe, it, expect } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("creates a logger with the configured level", () => {
    const logger = createLogger({ logLevel: "debug" });
    expect(logger).toBeDefined();
    expect(logger.level).toBe("debug");
  });

  it("derives component loggers that keep the level", () => {
    const logger = createLogger({ logLevel: "warn" });
    expect(logger.child({ component: "health" }).level).toBe("warn");
  });
});
