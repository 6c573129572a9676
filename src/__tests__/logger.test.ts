import { describe, expect, it } from "vitest";
import { Logger, type LogEntry } from "../logger.js";

describe("Logger", () => {
  it("filters below the configured level and merges child context", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: "info", context: { service: "test" }, output: (e) => entries.push(e) });

    logger.debug("hidden");
    logger.child({ component: "indexer" }).info("visible", { bookId: 1 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "info",
      message: "visible",
      context: { service: "test", component: "indexer", bookId: 1 },
    });
  });

  it("serializes errors", () => {
    const entries: LogEntry[] = [];
    new Logger({ output: (e) => entries.push(e) }).error("boom", new TypeError("bad input"));

    expect(entries[0]?.error).toMatchObject({ name: "TypeError", message: "bad input" });
    expect(entries[0]?.context).toBeUndefined();
  });
});
