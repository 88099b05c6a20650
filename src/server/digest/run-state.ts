/**
 * Last successful run timestamp, kept in a small text file.
 */

import fs from "node:fs/promises";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { errorMessage } from "@/server/errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LOOKBACK_DAYS = 3;

/**
 * Reads the last run time.
 *
 * @returns The stored instant, or `now` minus the lookback window when the file
 *   is missing or unreadable
 */
export async function readLastRun(
  statePath: string,
  now: Date,
  lookbackDays = DEFAULT_LOOKBACK_DAYS,
  log: Logger = defaultLogger
): Promise<Date> {
  const fallback = new Date(now.getTime() - lookbackDays * DAY_MS);

  let raw: string;
  try {
    raw = await fs.readFile(statePath, "utf8");
  } catch (error) {
    log.info("No previous run recorded, using lookback window", {
      statePath,
      lookbackDays,
      reason: errorMessage(error),
    });
    return fallback;
  }

  const parsed = new Date(raw.trim());
  if (Number.isNaN(parsed.getTime())) {
    log.warn("Ignoring unreadable last run timestamp", { statePath, value: raw.trim() });
    return fallback;
  }
  return parsed;
}

export async function saveLastRun(statePath: string, now: Date): Promise<void> {
  await fs.writeFile(statePath, now.toISOString());
}
