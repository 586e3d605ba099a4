import assert from "node:assert/strict";
import test from "node:test";
import { LogLevel, Logger, parseLogLevel } from "./logger";

test("parseLogLevel falls back to info for unknown values", () => {
  assert.equal(parseLogLevel(" WARN "), "warn");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});

test("Logger drops lines below the configured level and serializes errors", () => {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = new Logger("insights.test", "warn", (level, line) => lines.push({ level, line }));

  logger.info("ignored");
  logger.error("failed", { error: new TypeError("boom"), url: "https://shop.test" });

  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.level, "error");
  const payload = JSON.parse(lines[0]?.line ?? "{}");
  assert.equal(payload.scope, "insights.test");
  assert.equal(payload.message, "failed");
  assert.equal(payload.metadata.url, "https://shop.test");
  assert.equal(payload.metadata.error.name, "TypeError");
  assert.equal(payload.metadata.error.message, "boom");
});

test("Logger.child extends the scope and keeps the sink", () => {
  const scopes: string[] = [];
  const logger = new Logger("insights", "debug", (_level, line) => scopes.push(JSON.parse(line).scope));

  logger.child("http").debug("hello");

  assert.deepEqual(scopes, ["insights.http"]);
});
