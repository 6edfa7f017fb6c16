/**
 * @module config
 *
 * Environment-driven settings. The core itself needs none; these tune the
 * ambient behaviour (log verbosity, default leaderboard size). Invalid
 * values fall back to the defaults.
 */

import { integer, minValue, number, picklist, pipe, safeParse } from "valibot";

export const LOG_LEVEL_NAMES = ["ERROR", "WARN", "INFO", "DEBUG"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type Config = Readonly<{
  logLevel: LogLevel;
  leaderboardSize: number;
}>;

export const DEFAULT_CONFIG: Config = {
  logLevel: "INFO",
  leaderboardSize: 10,
};

const LogLevelSchema = picklist(LOG_LEVEL_NAMES);
const LeaderboardSizeSchema = pipe(number(), integer(), minValue(1));

/**
 * Reads `CIVICPULSE_LOG_LEVEL` and `CIVICPULSE_LEADERBOARD_SIZE`.
 * @param source Variables to read, `process.env` by default
 */
export function loadConfig(
  source: Readonly<Record<string, string | undefined>> = process.env,
): Config {
  const rawLevel = source.CIVICPULSE_LOG_LEVEL?.trim().toUpperCase();
  const level = safeParse(LogLevelSchema, rawLevel);

  const rawSize = source.CIVICPULSE_LEADERBOARD_SIZE?.trim();
  const size = rawSize
    ? safeParse(LeaderboardSizeSchema, Number(rawSize))
    : undefined;

  return {
    logLevel: level.success ? level.output : DEFAULT_CONFIG.logLevel,
    leaderboardSize: size?.success
      ? size.output
      : DEFAULT_CONFIG.leaderboardSize,
  };
}
