/**
 * Tests for the run log line format
 */
import { describe, expect, it } from "vitest";
import { formatLine } from "../src/utils/logger.js";

describe("formatLine", () => {
  it("writes time, level, module tag and message on one plain line", () => {
    expect(formatLine({ level: "info", message: "Creating package layout", timestamp: "12:04:31", module: "builder" }))
      .toBe("12:04:31 info: [builder] Creating package layout");
  });

  it("leaves out the tag when no module is given", () => {
    expect(formatLine({ level: "warn", message: "No model folder", timestamp: "12:04:32" }))
      .toBe("12:04:32 warn: No model folder");
  });

  it("puts the stack on the following lines", () => {
    expect(formatLine({ level: "error", message: "boom", timestamp: "12:04:33", stack: "Error: boom\n    at main" }))
      .toBe("12:04:33 error: boom\nError: boom\n    at main");
  });
});
