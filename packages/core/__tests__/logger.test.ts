/**
 * Tests for the JSON-lines logger.
 */

import { createLogger, isLogLevel, silentLogger } from "../src/logger";

function capture(level?: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = createLogger({ level, write: (line) => lines.push(line), timestamp: () => "2024-01-01T00:00:00.000Z" });
  return { logger, lines };
}

describe("createLogger", () => {
  it("writes one JSON object per line", () => {
    const { logger, lines } = capture();

    logger.info("Chunk sent", { size: 10 });

    expect(lines).toEqual(['{"ts":"2024-01-01T00:00:00.000Z","level":"info","msg":"Chunk sent","size":10}\n']);
  });

  it("drops entries below the level", () => {
    const { logger, lines } = capture("warn");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(["c", "d"]);
  });

  it("adds child bindings to every entry", () => {
    const { logger, lines } = capture();

    logger.child({ jobId: "contacts" }).child({ runId: "run_1" }).warn("Retrying");

    expect(JSON.parse(lines[0])).toEqual({
      ts: "2024-01-01T00:00:00.000Z",
      level: "warn",
      msg: "Retrying",
      jobId: "contacts",
      runId: "run_1",
    });
  });

  it("serializes errors by name and message", () => {
    const { logger, lines } = capture();

    logger.error("Failed", { error: new RangeError("out of range") });

    expect(JSON.parse(lines[0]).error).toEqual({ name: "RangeError", message: "out of range" });
  });
});

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});

describe("silentLogger", () => {
  it("returns itself as child", () => {
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
  });
});
