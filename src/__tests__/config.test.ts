import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { loadConfig, loadConfigOrExit } from "../config.js";
import { createLogger } from "../logger.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const cwd = path.resolve("/srv/review");

    expect(loadConfig({}, cwd)).toEqual({
      port: 8080,
      tasksFile: path.join(cwd, "merge_jian_fan_freq_lt100_20241223_anno.csv"),
      progressFile: path.join(cwd, "progress.csv"),
      defaultToPreCorrection: false,
      reviewLimit: 500,
      logLevel: "info"
    });
  });

  it("reads overrides from the environment", () => {
    const cwd = path.resolve("/srv/review");
    const config = loadConfig(
      {
        PORT: "9090",
        PROGRESS_FILE: "data/progress.csv",
        DEFAULT_TO_PRE_CORRECTION: "1",
        REVIEW_LIMIT: "50",
        LOG_LEVEL: "debug"
      },
      cwd
    );

    expect(config.port).toBe(9090);
    expect(config.progressFile).toBe(path.join(cwd, "data", "progress.csv"));
    expect(config.defaultToPreCorrection).toBe(true);
    expect(config.reviewLimit).toBe(50);
    expect(config.logLevel).toBe("debug");
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ DEFAULT_TO_PRE_CORRECTION: "yes" })).toThrow(z.ZodError);
    expect(() => loadConfig({ REVIEW_LIMIT: "0" })).toThrow(z.ZodError);
  });
});

describe("loadConfigOrExit", () => {
  it("logs invalid settings as fatal and exits with status 1", () => {
    const logger = createLogger({ level: "silent" });
    const fatal = vi.spyOn(logger, "fatal");
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    });

    expect(() => loadConfigOrExit(logger, { PORT: "not-a-port" }, exit)).toThrow("exit 1");
    expect(exit).toHaveBeenCalledWith(1);
    expect(fatal).toHaveBeenCalledTimes(1);
    expect(fatal.mock.calls[0][1]).toBe("Invalid configuration");
  });

  it("returns the configuration when it is valid", () => {
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    });

    const config = loadConfigOrExit(createLogger({ level: "silent" }), { REVIEW_LIMIT: "20" }, exit);

    expect(config.reviewLimit).toBe(20);
    expect(exit).not.toHaveBeenCalled();
  });
});
