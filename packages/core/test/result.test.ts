import { describe, it, expect } from "vitest";
import { Ok, Err, type Result } from "../src/result.js";

function parsePort(raw: string): Result<number, string> {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0) return Err(`invalid port: ${raw}`);
  return Ok(port);
}

describe("Result", () => {
  describe("Ok / Err", () => {
    it("creates success result with value", () => {
      const result = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it("creates error result with error", () => {
      const result = Err({ code: "Conflict", message: "already running" });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("Conflict");
    });

    it("narrows on the ok flag", () => {
      const good = parsePort("5678");
      const bad = parsePort("zero");

      expect(good.ok && good.value + 1).toBe(5679);
      expect(bad.ok ? null : bad.error).toBe("invalid port: zero");
    });
  });
});
