import { InvalidTimestampError } from "../errors.js";
import type { Clock, DueTimestamp, Horizon } from "../types.js";

/** Convert a Date or integer seconds to unix seconds; rejects anything fractional or invalid. */
export function toUnixSeconds(timestamp: DueTimestamp): number {
  const seconds =
    timestamp instanceof Date
      ? Math.floor(timestamp.getTime() / 1000)
      : timestamp;
  if (!Number.isSafeInteger(seconds)) {
    throw new InvalidTimestampError(
      "The supplied timestamp value could not be converted to an integer.",
    );
  }
  return seconds;
}

export function resolveHorizon(horizon: Horizon, clock: Clock): number {
  return horizon.kind === "now" ? clock() : toUnixSeconds(horizon.at);
}

/** "YYYY-MM-DD HH:MM:SS" in UTC. */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}
