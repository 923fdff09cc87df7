import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger } from "../../src/logging/logger.js";

function captureLines(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return {
    stream,
    lines: () =>
      buf
        .split("\n")
        .filter(Boolean)
        .map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger();
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates a silent logger", () => {
    const logger = createLogger({ level: "silent" });
    expect(logger.level).toBe("silent");
  });

  it("creates a child logger with the parent's level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "gateway" });
    expect(child.level).toBe("warn");
  });

  it("redacts credentials at the top level and one level down", () => {
    const { stream, lines } = captureLines();
    const logger = createLogger({ level: "info" }, stream);

    logger.info({ password: "analyst-pass", session: { refreshToken: "refresh-1", role: "analyst" } }, "login");

    const [line] = lines();
    expect(line?.["password"]).toBe("[REDACTED]");
    expect(line?.["session"]).toEqual({ refreshToken: "[REDACTED]", role: "analyst" });
    expect(line?.["msg"]).toBe("login");
  });

  it("redacts the authorization and internal key headers", () => {
    const { stream, lines } = captureLines();
    const logger = createLogger({ level: "info" }, stream);

    logger.info({ headers: { authorization: "Bearer abc", "x-internal-key": "test-internal-key", accept: "*/*" } }, "req");

    expect(lines()[0]?.["headers"]).toEqual({
      authorization: "[REDACTED]",
      "x-internal-key": "[REDACTED]",
      accept: "*/*",
    });
  });
});
