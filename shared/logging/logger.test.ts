/**
 * Logger Tests
 *
 * Covers level filtering, redaction, child context propagation,
 * the shared ring buffer and the plain-text / console formatters.
 */

import { describe, it, expect, vi } from "vitest";
import { Logger, RingBuffer } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { formatPlainText } from "./transports/file.js";
import type { LogEntry, LogTransport } from "./types.js";

function makeTransport(minLevel: LogTransport["minLevel"] = "trace") {
  const entries: LogEntry[] = [];
  const transport: LogTransport = {
    name: "memory",
    minLevel,
    log: (entry) => { entries.push(entry); },
  };
  return { transport, entries };
}

const FIXED_ENTRY: LogEntry = {
  timestamp: "2026-01-01T00:00:00.000Z",
  level: "info",
  component: "server.test",
  message: "hello",
  correlationId: "c-1",
  planId: "p-1",
  data: { a: 1 },
};

describe("Logger", () => {
  it("drops entries below the minimum level", () => {
    const { transport, entries } = makeTransport();
    const logger = new Logger({ minLevel: "info", component: "test", transports: [transport] });

    logger.debug("hidden");
    logger.info("shown");

    expect(entries.map(e => e.message)).toEqual(["shown"]);
    expect(logger.getRecentLogs().map(e => e.message)).toEqual(["shown"]);
  });

  it("respects each transport's own minimum level", () => {
    const { transport, entries } = makeTransport("warn");
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [transport] });

    logger.info("info");
    logger.warn("warn");

    expect(entries.map(e => e.level)).toEqual(["warn"]);
  });

  it("redacts sensitive keys, including nested ones", () => {
    const { transport, entries } = makeTransport();
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [transport] });

    logger.info("config", { apiKey: "test-secret", nested: { password: "pw", port: 3000 }, count: 2 });

    expect(entries[0].data).toEqual({
      apiKey: "[REDACTED]",
      nested: { password: "[REDACTED]", port: 3000 },
      count: 2,
    });
  });

  it("captures error details on error()", () => {
    const { transport, entries } = makeTransport();
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [transport] });

    logger.error("boom", new TypeError("bad input"), { step: 3 });

    expect(entries[0].error).toMatchObject({ name: "TypeError", message: "bad input" });
    expect(entries[0].data).toEqual({ step: 3 });
  });

  it("propagates component and correlation id to children and shares the buffer", () => {
    const { transport, entries } = makeTransport();
    const root = new Logger({ minLevel: "trace", component: "server", transports: [transport] });
    const child = root.child({ component: "server.planner", correlationId: "corr-42", planId: "plan-1" });

    child.info("planning");

    expect(entries[0]).toMatchObject({
      component: "server.planner",
      correlationId: "corr-42",
      planId: "plan-1",
    });
    expect(root.getRecentLogs(1)[0].message).toBe("planning");
  });

  it("reconfigures every child, including ones created earlier", () => {
    const first = makeTransport();
    const second = makeTransport();
    const root = new Logger({ minLevel: "trace", component: "server", transports: [first.transport] });
    const child = root.child({ component: "server.engine" });

    const replaced = root.reconfigure({ minLevel: "warn", transports: [second.transport] });
    child.info("dropped");
    child.warn("moved");

    expect(replaced).toEqual([first.transport]);
    expect(first.entries).toEqual([]);
    expect(second.entries.map(e => e.message)).toEqual(["moved"]);
  });

  it("keeps logging when a transport throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const broken: LogTransport = { name: "broken", minLevel: "trace", log: () => { throw new Error("disk full"); } };
    const { transport, entries } = makeTransport();
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [broken, transport] });

    logger.info("still here");

    expect(entries).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});

describe("RingBuffer", () => {
  it("keeps only the most recent items in insertion order", () => {
    const buffer = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buffer.push(n);

    expect(buffer.getAll()).toEqual([3, 4, 5]);
    expect(buffer.getLast(2)).toEqual([4, 5]);
  });

  it("clears", () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.clear();
    expect(buffer.getAll()).toEqual([]);
  });
});

describe("formatters", () => {
  it("formats plain text lines with trace keys", () => {
    expect(formatPlainText(FIXED_ENTRY)).toBe(
      '2026-01-01T00:00:00.000Z INFO  [server.test] hello cid=c-1 plan=p-1 {"a":1}',
    );
  });

  it("formats console lines without colors", () => {
    const transport = new ConsoleTransport({ colors: false });
    expect(transport.format(FIXED_ENTRY)).toBe('00:00:00 INF [server.test] (c-1) hello {"a":1}');
  });
});
