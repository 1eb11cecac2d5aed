import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates a child logger that keeps the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "connection" });
    expect(child.level).toBe("warn");
    expect(child.bindings()).toEqual({ name: "tidebot", component: "connection" });
  });
});
