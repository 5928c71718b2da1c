import { describe, it, expect, vi, afterEach } from "vitest";
import { createMoverLogger, isLogLevel } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function spyConsole() {
  // Winston binds console methods when the transport is built, so spy first.
  return [
    vi.spyOn(console, "log").mockImplementation(() => {}),
    vi.spyOn(console, "warn").mockImplementation(() => {}),
    vi.spyOn(console, "error").mockImplementation(() => {}),
    vi.spyOn(console, "debug").mockImplementation(() => {}),
  ];
}

function printed(spies: ReturnType<typeof spyConsole>): string[] {
  return spies.flatMap((s) => s.mock.calls.map((args) => args.map(String).join(" ")));
}

describe("createMoverLogger", () => {
  it("returns a Logger-compatible object", () => {
    const logger = createMoverLogger();
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
  });

  it("suppresses lines below the configured level", () => {
    const spies = spyConsole();
    const logger = createMoverLogger({ level: "warn", prefix: "test" });

    logger.debug?.("dbg-suppressed");
    logger.info("info-suppressed");
    logger.warn("warn-visible");

    const lines = printed(spies);
    expect(lines.some((l) => l.includes("dbg-suppressed"))).toBe(false);
    expect(lines.some((l) => l.includes("info-suppressed"))).toBe(false);
    expect(lines.some((l) => l.includes("warn-visible"))).toBe(true);
  });

  it("formats lines as timestamp, [prefix:level], message", () => {
    const spies = spyConsole();
    const logger = createMoverLogger({ prefix: "engine-test" });
    logger.info("stage advanced");

    const line = printed(spies).find((l) => l.includes("stage advanced"));
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}.* \[engine-test:info\] stage advanced/);
  });

  it("uses default prefix 'mover'", () => {
    const spies = spyConsole();
    createMoverLogger().info("msg");
    expect(printed(spies).some((l) => l.includes("[mover:info] msg"))).toBe(true);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
