import test from "node:test";
import assert from "node:assert/strict";
import { createLogger, errorMessage, sanitizeMeta } from "./logger";

function captureLines(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

test("createLogger drops records below the threshold", () => {
  const { lines, sink } = captureLines();
  const logger = createLogger("warn", sink);

  logger.debug("debug_event");
  logger.info("info_event");
  logger.warn("warn_event");
  logger.error("error_event", { status: 500 });

  assert.equal(lines.length, 2);
  const first: unknown = JSON.parse(lines[0] ?? "");
  const second: unknown = JSON.parse(lines[1] ?? "");
  assert.ok(typeof first === "object" && first !== null);
  assert.ok(typeof second === "object" && second !== null);
  assert.equal(Reflect.get(first, "level"), "warn");
  assert.equal(Reflect.get(first, "msg"), "warn_event");
  assert.equal(Reflect.has(first, "meta"), false);
  assert.equal(Reflect.get(second, "level"), "error");
  assert.deepEqual(Reflect.get(second, "meta"), { status: 500 });
});

test("createLogger writes an ISO timestamp on every record", () => {
  const { lines, sink } = captureLines();
  createLogger("debug", sink).debug("tick");
  const record: unknown = JSON.parse(lines[0] ?? "");
  assert.ok(typeof record === "object" && record !== null);
  const at = Reflect.get(record, "at");
  assert.equal(typeof at, "string");
  assert.equal(Number.isNaN(Date.parse(String(at))), false);
});

test("sanitizeMeta redacts secret-looking keys at any depth", () => {
  assert.deepEqual(
    sanitizeMeta({
      host: "db.internal",
      PGPASSWORD: "test-secret",
      nested: { authorizationHeader: "Bearer test-token", keep: [1, { apiKey: "x" }] },
    }),
    {
      host: "db.internal",
      PGPASSWORD: "[redacted]",
      nested: { authorizationHeader: "[redacted]", keep: [1, { apiKey: "[redacted]" }] },
    }
  );
});

test("sanitizeMeta flattens errors to name and message", () => {
  assert.deepEqual(sanitizeMeta({ err: new TypeError("boom") }), { err: { name: "TypeError", message: "boom" } });
});

test("errorMessage handles non-error values", () => {
  assert.equal(errorMessage(new Error("failed")), "failed");
  assert.equal(errorMessage("plain"), "plain");
  assert.equal(errorMessage(42), "42");
});
