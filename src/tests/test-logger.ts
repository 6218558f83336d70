import { expect, test } from "vitest";
import type { LogLevel } from "../config/types.js";
import { Logger } from "../utils/logger.js";

function capture(opts: { level: LogLevel; scopes?: string[]; format: "pretty" | "json" }) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new Logger(opts, (level, line) => lines.push([level, line]), () => new Date("2024-05-01T12:34:56.000Z"));
  return { logger, lines };
}

test("entries below the level or outside the scopes are dropped", () => {
  const { logger, lines } = capture({ level: "info", scopes: ["turn"], format: "pretty" });
  logger.debug("too quiet", "turn");
  logger.info("other scope", "db");
  logger.info("kept", "turn");
  logger.warn("no scope");
  expect(lines).toEqual([
    ["info", "12:34:56 [INF] │ turn kept"],
    ["warn", "12:34:56 [WRN] no scope"],
  ]);
});

test("json output carries the whole entry", () => {
  const { logger, lines } = capture({ level: "trace", format: "json" });
  logger.error("boom", "server", { status: 500 });
  expect(JSON.parse(lines[0][1])).toEqual({
    timestamp: "2024-05-01T12:34:56.000Z",
    level: "error",
    scope: "server",
    message: "boom",
    data: { status: 500 },
  });
});

test("child loggers merge their bindings into every entry", () => {
  const { logger, lines } = capture({ level: "info", format: "pretty" });
  const sessionLog = logger.withScope("turn").child({ sessionId: "s1" });
  sessionLog.info("plain");
  sessionLog.warn("with data", { attempt: 2 });
  sessionLog.child({ turn: 3 }).info("nested", ["x"]);
  expect(lines.map(([, line]) => line)).toEqual([
    '12:34:56 [INF] │ turn plain │ {"sessionId":"s1"}',
    '12:34:56 [WRN] │ turn with data │ {"sessionId":"s1","attempt":2}',
    '12:34:56 [INF] │ turn nested │ {"sessionId":"s1","turn":3,"data":["x"]}',
  ]);
});
