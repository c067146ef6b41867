import { test } from "node:test";
import { expect } from "expect";
import electronLog from "electron-log/node";

// Test Case LGI1: Loading the library leaves the application's logger alone
test("logger - importing it keeps the default electron-log transports as configured", async () => {
  electronLog.transports.file.level = "info";
  electronLog.transports.console.level = "silly";

  const { logger } = await import("./logger.ts");

  expect(typeof logger.warn).toBe("function");
  expect(electronLog.transports.file.level).toBe("info");
  expect(electronLog.transports.console.level).toBe("silly");
});
