import { describe, it, expect } from "vitest";
import { createLogger } from "../src/logger.js";

function recordingLogger(level?: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = createLogger("supervisor", { level, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe("createLogger", () => {
  it("prefixes lines with the scope", () => {
    const { logger, lines } = recordingLogger();
    logger.info("Worker started (PID 12)");
    expect(lines).toEqual(["[supervisor] Worker started (PID 12)"]);
  });

  it("tags non-info levels", () => {
    const { logger, lines } = recordingLogger("debug");
    logger.debug("line 1");
    logger.warn("slow observer");
    expect(lines).toEqual(["[supervisor] debug: line 1", "[supervisor] warn: slow observer"]);
  });

  it("drops lines below the threshold", () => {
    const { logger, lines } = recordingLogger("warn");
    logger.debug("hidden");
    logger.info("hidden too");
    logger.error("shown");
    expect(lines).toEqual(["[supervisor] error: shown"]);
  });

  it("appends the cause of an error", () => {
    const { logger, lines } = recordingLogger();
    logger.error("Relay read failed", new Error("EPIPE"));
    logger.error("Odd failure", 7);
    expect(lines).toEqual([
      "[supervisor] error: Relay read failed: EPIPE",
      "[supervisor] error: Odd failure: 7",
    ]);
  });

  it("creates child loggers with a nested scope and the same threshold", () => {
    const { logger, lines } = recordingLogger("warn");
    const child = logger.child("relay");
    child.info("hidden");
    child.warn("stream error");
    expect(child.scope).toBe("supervisor:relay");
    expect(lines).toEqual(["[supervisor:relay] warn: stream error"]);
  });
});
