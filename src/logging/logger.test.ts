import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "./logger.js";

function capture(): { lines: () => Array<Record<string, unknown>>; write: (msg: string) => void } {
  const raw: string[] = [];
  return {
    write: (msg: string) => {
      raw.push(msg);
    },
    lines: () => raw.map((line) => JSON.parse(line)),
  };
}

describe("createLogger", () => {
  it("writes JSON lines tagged with the app name", () => {
    const sink = capture();
    const log = createLogger({ level: "info", pretty: false, redactSensitive: true }, sink);

    log.info({ count: 2 }, "update appended");

    expect(sink.lines()).toHaveLength(1);
    expect(sink.lines()[0]).toMatchObject({
      name: "waypoint",
      level: 30,
      msg: "update appended",
      count: 2,
    });
  });

  it("redacts session tokens, child loggers included", () => {
    const sink = capture();
    const log = createLogger({ level: "info", pretty: false, redactSensitive: true }, sink);

    log.child({ component: "session-store" }).info({ token: "abc123" }, "session created");
    log.info({ session: { token: "abc123" } }, "nested");

    expect(sink.lines()[0].token).toBe("[redacted]");
    expect(sink.lines()[0].component).toBe("session-store");
    expect(sink.lines()[1].session).toEqual({ token: "[redacted]" });
  });

  it("keeps tokens when redaction is off", () => {
    const sink = capture();
    const log = createLogger({ level: "info", pretty: false, redactSensitive: false }, sink);

    log.info({ token: "abc123" }, "session created");
    expect(sink.lines()[0].token).toBe("abc123");
  });

  it("drops messages below the configured level", () => {
    const sink = capture();
    const log = createLogger({ level: "warn", pretty: false, redactSensitive: true }, sink);

    log.info("hidden");
    log.warn("shown");
    expect(sink.lines().map((l) => l.msg)).toEqual(["shown"]);
  });
});

describe("silentLogger", () => {
  it("is disabled for every level", () => {
    const log = silentLogger();
    expect(log.isLevelEnabled("error")).toBe(false);
  });
});
