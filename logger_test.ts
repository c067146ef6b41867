import { test } from "node:test";
import { expect } from "expect";

import { parseLogLevel } from "./logger.ts";

// Test Case LOG1: Accepts known levels in any case
test("parseLogLevel - accepts known levels in any case", () => {
  expect(parseLogLevel("debug")).toBe("debug");
  expect(parseLogLevel(" Error ")).toBe("error");
  expect(parseLogLevel("SILLY")).toBe("silly");
});

// Test Case LOG2: Turns logging off
test("parseLogLevel - turns logging off", () => {
  expect(parseLogLevel("false")).toBe(false);
  expect(parseLogLevel("off")).toBe(false);
});

// Test Case LOG3: Falls back for missing or unknown levels
test("parseLogLevel - falls back for missing or unknown levels", () => {
  expect(parseLogLevel(undefined)).toBe("warn");
  expect(parseLogLevel("")).toBe("warn");
  expect(parseLogLevel("loud")).toBe("warn");
  expect(parseLogLevel("loud", "info")).toBe("info");
});
