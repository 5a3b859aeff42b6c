/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      env: "development",
      logLevel: "debug",
      logDir: join(homedir(), ".nudge", "logs"),
      dbPath: join(homedir(), ".nudge", "data", "nudge.db"),
      dispatcher: {
        shortHorizonMs: 60_000,
        fetchRetryMs: 5_000,
        idleRecheckMs: 3_600_000,
      },
      store: {
        horizonMs: 28 * 24 * 60 * 60 * 1000,
      },
    });
  });

  it("logs at info in production", () => {
    expect(loadConfig({ NODE_ENV: "production" }).logLevel).toBe("info");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      LOG_LEVEL: "warn",
      LOG_DIR: "/var/log/nudge",
      DB_DIR: "/srv/nudge",
      SHORT_ACTION_THRESHOLD_SECONDS: "30",
      FETCH_HORIZON_DAYS: "7",
      FETCH_RETRY_MS: "250",
      IDLE_RECHECK_SECONDS: "60",
    });

    expect(config.logLevel).toBe("warn");
    expect(config.logDir).toBe("/var/log/nudge");
    expect(config.dbPath).toBe(join("/srv/nudge", "nudge.db"));
    expect(config.dispatcher).toEqual({ shortHorizonMs: 30_000, fetchRetryMs: 250, idleRecheckMs: 60_000 });
    expect(config.store.horizonMs).toBe(7 * 24 * 60 * 60 * 1000);
  });

  it("allows disabling the fast path", () => {
    expect(loadConfig({ SHORT_ACTION_THRESHOLD_SECONDS: "0" }).dispatcher.shortHorizonMs).toBe(0);
  });

  it("collects every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: "loud", FETCH_HORIZON_DAYS: "0" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]?.startsWith("LOG_LEVEL: ")).toBe(true);
    expect(caught.issues[1]).toBe("FETCH_HORIZON_DAYS: Number must be greater than 0");
    expect(caught.message.startsWith("Invalid configuration: LOG_LEVEL: ")).toBe(true);
  });

  it("rejects non-numeric durations", () => {
    expect(() => loadConfig({ FETCH_RETRY_MS: "soon" })).toThrow(ConfigError);
  });
});
