/**
 * Orchestrator Logging Tests
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  compareLogLevels,
  createDefaultFormatter,
  createLogger,
  createSilentLogger,
  FileTransport,
  isLogLevel,
  MemoryTransport,
  shouldLog,
  StructuredLogger,
  type LogEntry,
} from "./logger.js";

function memoryLogger(options: { level?: "trace" | "info" | "warn"; redactPatterns?: string[] } = {}) {
  const transport = new MemoryTransport();
  const logger = new StructuredLogger({ subsystem: "orchestrate", transports: [transport], ...options });
  return { logger, transport };
}

describe("Log Level Utilities", () => {
  it("should compare log levels", () => {
    expect(compareLogLevels("trace", "debug")).toBe(-1);
    expect(compareLogLevels("warn", "warn")).toBe(0);
    expect(compareLogLevels("fatal", "info")).toBe(1);
  });

  it("should gate levels against a minimum", () => {
    expect(shouldLog("error", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("trace", "trace")).toBe(true);
  });

  it("should recognize level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });
});

describe("Default Log Formatter", () => {
  const entry: LogEntry = {
    timestamp: new Date("2025-01-01T00:00:00Z"),
    level: "info",
    subsystem: "orchestrate/run",
    message: "Started",
    metadata: { event: "step:start" },
    target: "shop",
    step: "build",
    attempt: 2,
  };

  it("should render timestamp, level, subsystem, context and metadata", () => {
    const formatter = createDefaultFormatter({ colors: false });
    expect(formatter(entry)).toBe(
      '2025-01-01T00:00:00.000Z INFO  [orchestrate/run] Started (target=shop step=build attempt=2) {"event":"step:start"}',
    );
  });

  it("should drop timestamps and metadata when asked", () => {
    const formatter = createDefaultFormatter({ colors: false, timestamps: false, includeMetadata: false });
    expect(formatter({ ...entry, level: "warn", target: undefined, step: undefined, attempt: undefined })).toBe(
      "WARN  [orchestrate/run] Started",
    );
  });

  it("should wrap parts in ANSI codes when colors are on", () => {
    const formatter = createDefaultFormatter({ colors: true, timestamps: false, includeMetadata: false });
    expect(formatter({ ...entry, target: undefined, step: undefined, attempt: undefined })).toBe(
      "\x1b[32mINFO \x1b[0m \x1b[34m[orchestrate/run]\x1b[0m Started",
    );
  });
});

describe("StructuredLogger", () => {
  it("should filter entries below the level", () => {
    const { logger, transport } = memoryLogger({ level: "warn" });

    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");

    expect(transport.messages()).toEqual(["shown", "also shown"]);
    expect(transport.messages("error")).toEqual(["also shown"]);
  });

  it("should change level at runtime", () => {
    const { logger, transport } = memoryLogger();

    logger.debug("before");
    logger.setLevel("debug");
    logger.debug("after");

    expect(logger.getLevel()).toBe("debug");
    expect(logger.isLevelEnabled("trace")).toBe(false);
    expect(transport.messages()).toEqual(["after"]);
  });

  it("should name children after their parent and share transports", () => {
    const { logger, transport } = memoryLogger();

    logger.child("run").child("executor").info("go");

    expect(transport.entries[0].subsystem).toBe("orchestrate/run/executor");
  });

  it("should merge context fields", () => {
    const { logger, transport } = memoryLogger();

    logger.withContext({ target: "shop" }).withContext({ step: "build", attempt: 1 }).info("attempt");

    const [entry] = transport.entries;
    expect([entry.target, entry.step, entry.attempt]).toEqual(["shop", "build", 1]);
  });

  it("should redact messages and nested metadata", () => {
    const { logger, transport } = memoryLogger({ redactPatterns: ["token=\\S+"] });

    logger.child("auth").info("login token=abc123 ok", { header: "token=xyz", nested: { value: "Token=q" }, count: 3 });

    const [entry] = transport.entries;
    expect(entry.message).toBe("login [REDACTED] ok");
    expect(entry.metadata).toEqual({ header: "[REDACTED]", nested: { value: "[REDACTED]" }, count: 3 });
  });

  it("should keep logging when a transport throws", () => {
    const memory = new MemoryTransport();
    const broken = {
      name: "broken",
      write: () => {
        throw new Error("disk gone");
      },
    };
    const logger = new StructuredLogger({ subsystem: "orchestrate", transports: [broken, memory] });

    logger.info("still here");

    expect(memory.messages()).toEqual(["still here"]);
  });
});

describe("FileTransport", () => {
  it("should append formatted lines", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrate-log-"));
    const file = path.join(dir, "run.log");
    try {
      const logger = createLogger("orchestrate", { level: "debug", destinations: [{ type: "file", path: file }] });
      logger.debug("one");
      logger.trace("dropped");
      logger.warn("two");
      logger.close();

      const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\S+ DEBUG \[orchestrate\] one$/);
      expect(lines[1]).toMatch(/^\S+ WARN  \[orchestrate\] two$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should respect its own minimum level", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrate-log-"));
    const file = path.join(dir, "run.log");
    try {
      const transport = new FileTransport(file, { minLevel: "error" });
      const logger = new StructuredLogger({ subsystem: "orchestrate", level: "trace", transports: [transport] });
      logger.info("skipped");
      logger.close();

      expect(fs.existsSync(file)).toBe(false);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("createSilentLogger", () => {
  it("should only enable fatal", () => {
    const logger = createSilentLogger("test");
    expect(logger.subsystem).toBe("test");
    expect(logger.isLevelEnabled("error")).toBe(false);
    expect(logger.isLevelEnabled("fatal")).toBe(true);
  });
});
