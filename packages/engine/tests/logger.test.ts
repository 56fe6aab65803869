import { describe, it, expect } from "vitest";
import { createLogger } from "../src/logger.js";

function capture(level: "warn" | "silent"): { lines: string[]; log: ReturnType<typeof createLogger> } {
  const lines: string[] = [];
  const log = createLogger(
    { LOG_LEVEL: level, NODE_ENV: "test" },
    { write: (line: string) => void lines.push(line) },
  );
  return { lines, log };
}

describe("createLogger", () => {
  it("drops lines below the configured level", () => {
    const { lines, log } = capture("warn");

    log.info("ignored");
    log.warn({ code: "ACCOUNT_LOCKED" }, "kept");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: 40,
      code: "ACCOUNT_LOCKED",
      msg: "kept",
    });
  });

  it("writes nothing when silent", () => {
    const { lines, log } = capture("silent");

    log.fatal("ignored");

    expect(lines).toEqual([]);
  });
});
