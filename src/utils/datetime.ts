import { DateTime } from "luxon";
import { InvalidArgumentError } from "./errors.js";

/** Human-readable instant format used on the command line and in logs. */
export const DATETIME_FORMAT = "yyyy-MM-dd HH:mm:ss 'UTC'";

export function currentTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

export function timestampToDatetime(timestamp: number): string {
  return DateTime.fromSeconds(timestamp, { zone: "utc" }).toFormat(DATETIME_FORMAT);
}

/** Parses `YYYY-MM-DD HH:MM:SS UTC` into epoch seconds. */
export function datetimeToTimestamp(value: string): number {
  const parsed = DateTime.fromFormat(value, DATETIME_FORMAT, { zone: "utc" });
  if (!parsed.isValid) {
    throw new InvalidArgumentError(
      `Invalid datetime "${value}": expected format "YYYY-MM-DD HH:MM:SS UTC"`,
    );
  }
  return Math.floor(parsed.toSeconds());
}
