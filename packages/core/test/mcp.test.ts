import { describe, it, expect } from "vitest";
import { errorResponse, successResponse, resultToStructuredResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("errorResponse", () => {
    it("formats a plain message", () => {
      expect(errorResponse("Something went wrong")).toEqual({
        content: [{ type: "text", text: "Error: Something went wrong" }],
        structuredContent: { success: false, error: "Something went wrong" },
        isError: true,
      });
    });

    it("uses the message of an Error", () => {
      expect(errorResponse(new Error("boom")).structuredContent).toEqual({
        success: false,
        error: "boom",
      });
    });

    it("keeps the code of a coded failure", () => {
      expect(errorResponse({ code: "NotRunning", message: "Worker is idle" })).toEqual({
        content: [{ type: "text", text: "Error (NotRunning): Worker is idle" }],
        structuredContent: { success: false, error: "Worker is idle", code: "NotRunning" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("merges data and success flag", () => {
      expect(successResponse("Found 2 observers", { count: 2 })).toEqual({
        content: [{ type: "text", text: "Found 2 observers" }],
        structuredContent: { count: 2, success: true },
      });
    });
  });

  describe("resultToStructuredResponse", () => {
    it("formats an Ok result", () => {
      const result: Result<{ pid: number }, string> = Ok({ pid: 4242 });
      const response = resultToStructuredResponse(result, (value) => ({
        text: `Started (PID ${value.pid})`,
        data: { pid: value.pid },
      }));
      expect(response).toEqual({
        content: [{ type: "text", text: "Started (PID 4242)" }],
        structuredContent: { pid: 4242, success: true },
      });
    });

    it("formats a coded Err result", () => {
      const result: Result<{ pid: number }, { code: string; message: string }> = Err({
        code: "Conflict",
        message: "Worker is running",
      });
      const response = resultToStructuredResponse(result, (value) => ({
        text: `Started (PID ${value.pid})`,
        data: { pid: value.pid },
      }));
      expect(response.structuredContent).toEqual({
        success: false,
        error: "Worker is running",
        code: "Conflict",
      });
      expect(response.isError).toBe(true);
    });
  });
});
