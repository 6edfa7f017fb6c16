import { afterEach, expect, test, vi } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../src/config.ts";
import {
  createLogger,
  getLogLevel,
  isLevelEnabled,
  setLogLevel,
} from "../src/logger.ts";

const initialLevel = getLogLevel();
const logger = createLogger("test");

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel(initialLevel);
});

// ===== Config =====

test("Config - defaults when nothing is set", () => {
  expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  expect(DEFAULT_CONFIG).toEqual({ logLevel: "INFO", leaderboardSize: 10 });
});

test("Config - reads level and leaderboard size", () => {
  expect(loadConfig({
    CIVICPULSE_LOG_LEVEL: " debug ",
    CIVICPULSE_LEADERBOARD_SIZE: "25",
  })).toEqual({ logLevel: "DEBUG", leaderboardSize: 25 });
});

test("Config - invalid values fall back to defaults", () => {
  expect(loadConfig({
    CIVICPULSE_LOG_LEVEL: "verbose",
    CIVICPULSE_LEADERBOARD_SIZE: "0",
  })).toEqual(DEFAULT_CONFIG);
  expect(loadConfig({ CIVICPULSE_LEADERBOARD_SIZE: "2.5" }).leaderboardSize)
    .toBe(10);
  expect(loadConfig({ CIVICPULSE_LEADERBOARD_SIZE: "ten" }).leaderboardSize)
    .toBe(10);
});

// ===== Logger =====

test("Logger - writes JSON lines with context", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  setLogLevel("INFO");

  logger.info("Issue submitted", { id: "iss-1" });

  expect(logSpy).toHaveBeenCalledTimes(1);
  const entry = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
  expect(entry).toMatchObject({
    level: "INFO",
    scope: "test",
    message: "Issue submitted",
    context: { id: "iss-1" },
  });
  expect(typeof entry.timestamp).toBe("string");
});

test("Logger - filters below the configured level", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  setLogLevel("WARN");

  logger.info("hidden");
  logger.debug("hidden");
  logger.warn("shown");
  logger.error("also shown");

  expect(logSpy).toHaveBeenCalledTimes(1);
  expect(errorSpy).toHaveBeenCalledTimes(1);
  expect(getLogLevel()).toBe("WARN");
  expect(isLevelEnabled("INFO")).toBe(false);
  expect(isLevelEnabled("ERROR")).toBe(true);
});

test("Logger - omits scope and context when none is given", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  setLogLevel("DEBUG");

  createLogger().debug("plain");

  const entry = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
  expect(Object.keys(entry)).toEqual(["timestamp", "level", "message"]);
});

test("Logger - a pinned level ignores the process-wide one", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  setLogLevel("ERROR");

  createLogger("pinned", "DEBUG").debug("shown");
  createLogger("shared").debug("hidden");

  expect(logSpy).toHaveBeenCalledTimes(1);
  expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toMatchObject({
    scope: "pinned",
    message: "shown",
  });
  expect(isLevelEnabled("DEBUG", "DEBUG")).toBe(true);
  expect(isLevelEnabled("DEBUG")).toBe(false);
});
