import { describe, it, expect } from "vitest";
import { Logger, createLogger, defaultLogLevel } from "../../utils/logger.js";
import { createCollector } from "../fixtures.js";

describe("defaultLogLevel()", () => {
  it("is debug when DEBUG is set", () => {
    expect(defaultLogLevel({ DEBUG: "1" })).toBe("debug");
  });

  it("is info otherwise", () => {
    expect(defaultLogLevel({})).toBe("info");
    expect(defaultLogLevel({ DEBUG: "" })).toBe("info");
  });
});

describe("Logger", () => {
  it("writes levelled lines with data", () => {
    const log = createCollector();
    const logger = new Logger({ sink: log.stream, level: "info", colors: false });
    logger.debug("hidden");
    logger.info("hello");
    logger.error("failed", { line: 3 });
    expect(log.text()).toBe('[info] hello\n[error] failed {"line":3}\n');
  });

  it("drops lines below the level", () => {
    const log = createCollector();
    const logger = new Logger({ sink: log.stream, level: "warn", colors: false });
    logger.info("no");
    logger.warn("yes");
    expect(log.text()).toBe("[warn] yes\n");
  });

  it("writes nothing when silent", () => {
    const log = createCollector();
    const logger = new Logger({ sink: log.stream, level: "debug", silent: true });
    logger.error("boom");
    expect(log.text()).toBe("");
  });

  it("nests context in child loggers", () => {
    const log = createCollector();
    const logger = createLogger("a", { sink: log.stream, level: "debug", colors: false });
    logger.child("b").warn("w", { n: 1 });
    expect(log.text()).toBe('[warn] (a:b) w {"n":1}\n');
  });

  it("colors the level and context when asked", () => {
    const log = createCollector();
    const logger = createLogger("a", { sink: log.stream, colors: true });
    logger.error("boom");
    expect(log.text()).toBe("\x1b[31m[error]\x1b[0m \x1b[2m(a)\x1b[0m boom\n");
  });

  it("does not color a sink that is not a terminal", () => {
    const log = createCollector();
    createLogger("a", { sink: log.stream }).error("boom");
    expect(log.text()).toBe("[error] (a) boom\n");
  });
});
