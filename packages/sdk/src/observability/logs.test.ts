import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { formatLogEntry, logger, type LogEntry } from "./logs.js";

describe("formatLogEntry", () => {
  it("prints level, event, location, message and details", () => {
    const line = formatLogEntry({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "warn",
      event: "engine.rollback",
      script: "deactivate_user",
      category: "users",
      message: "no such table: audit",
      details: { steps: 2 },
    });

    expect(line).toBe(
      '[2024-05-01T10:00:00.000Z] [WARN] [engine.rollback] users/deactivate_user no such table: audit {"steps":2}'
    );
  });

  it("omits the parts an entry does not carry", () => {
    expect(
      formatLogEntry({ timestamp: "2024-05-01T10:00:00.000Z", level: "info", event: "index.load" })
    ).toBe("[2024-05-01T10:00:00.000Z] [INFO] [index.load]");
  });
});

describe("logger", () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    logger.setSink((_line, entry) => entries.push(entry));
    logger.setEnabled(true);
  });

  afterEach(() => {
    logger.setSink(undefined);
    logger.setLevel(undefined);
  });

  it("drops entries below the threshold", () => {
    logger.setLevel("warn");

    logger.debug("index.add");
    logger.info("index.load");
    logger.warn("engine.rollback", { script: "broken" });
    logger.error("engine.rollback_failed");

    expect(entries.map((e) => [e.level, e.event])).toEqual([
      ["warn", "engine.rollback"],
      ["error", "engine.rollback_failed"],
    ]);
    expect(entries[0]?.script).toBe("broken");
  });

  it("passes debug entries at the debug threshold", () => {
    logger.setLevel("debug");

    logger.debug("engine.execute", { script: "get_user" });

    expect(entries).toHaveLength(1);
  });

  it("is silent when disabled", () => {
    logger.setEnabled(false);

    logger.error("engine.rollback_failed");

    expect(entries).toEqual([]);
  });
});
