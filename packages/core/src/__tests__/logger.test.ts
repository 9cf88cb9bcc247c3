import { describe, it, expect, vi, afterEach } from "vitest";

function captureStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

async function freshLogger() {
  vi.resetModules();
  return import("../logger.js");
}

function lines(spy: { mock: { calls: unknown[][] } }): Record<string, unknown>[] {
  return spy.mock.calls.map(([chunk]) => JSON.parse(String(chunk)));
}

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes component lines to stderr when asked", async () => {
    const { createLogger, getLogger } = await freshLogger();
    const stderr = captureStderr();

    createLogger({ level: "info", destination: "stderr" });
    getLogger("console").info("ready");

    expect(lines(stderr)).toEqual([
      expect.objectContaining({ level: "info", component: "console", msg: "ready" }),
    ]);
  });

  it("reconfigures loggers taken before createLogger", async () => {
    const { createLogger, getLogger } = await freshLogger();
    const stderr = captureStderr();
    const early = getLogger("market");
    expect(early.level).toBe("silent");

    createLogger({ level: "debug", destination: "stderr" });
    early.debug("candles loaded");

    expect(early.level).toBe("debug");
    expect(lines(stderr)).toEqual([
      expect.objectContaining({ level: "debug", component: "market", msg: "candles loaded" }),
    ]);
  });

  it("keeps the level when only the destination changes", async () => {
    const { createLogger, getLogger } = await freshLogger();
    const stderr = captureStderr();
    createLogger({ level: "warn" });
    const logger = getLogger("router");

    createLogger({ destination: "stderr" });
    logger.info("dropped");
    logger.warn("kept");

    expect(logger.level).toBe("warn");
    expect(lines(stderr).map((l) => l.msg)).toEqual(["kept"]);
  });
});
