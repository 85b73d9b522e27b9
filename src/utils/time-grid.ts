import { TIMESTEP_SECONDS, type Timestep } from "../config/timesteps.js";
import { datetimeToTimestamp } from "./datetime.js";
import { InvalidArgumentError } from "./errors.js";

export interface InstantInput {
  /** Epoch seconds. */
  time?: number;
  /** `YYYY-MM-DD HH:MM:SS UTC`. */
  datetime?: string;
}

/**
 * Resolves exactly one of `time` / `datetime` to epoch seconds and checks that
 * it sits on the timestep's grid. Throws InvalidArgumentError otherwise.
 */
export function resolveInstant(timestep: Timestep, input: InstantInput): number {
  const hasTime = input.time !== undefined;
  const hasDatetime = input.datetime !== undefined;

  if (hasTime === hasDatetime) {
    throw new InvalidArgumentError(
      hasTime
        ? "Provide either a timestamp or a datetime string, not both"
        : "Provide a timestamp or a datetime string",
    );
  }

  const instant = input.datetime !== undefined ? datetimeToTimestamp(input.datetime) : input.time;
  if (instant === undefined || !Number.isSafeInteger(instant) || instant < 0) {
    throw new InvalidArgumentError(`Timestamp must be a non-negative integer (got ${String(instant)})`);
  }

  const seconds = TIMESTEP_SECONDS[timestep];
  if (instant % seconds !== 0) {
    throw new InvalidArgumentError(
      `Timestamp ${instant} is not aligned to the ${timestep} timestep (multiple of ${seconds}s required)`,
    );
  }

  return instant;
}

export function isAligned(time: number, timestep: Timestep): boolean {
  return Number.isSafeInteger(time) && time >= 0 && time % TIMESTEP_SECONDS[timestep] === 0;
}

export function floorToGrid(time: number, timestep: Timestep): number {
  const seconds = TIMESTEP_SECONDS[timestep];
  return Math.floor(time / seconds) * seconds;
}

/** Start of the most recent bucket that has fully elapsed at `now`. */
export function latestCompleteInstant(timestep: Timestep, now: number): number {
  return floorToGrid(now, timestep) - TIMESTEP_SECONDS[timestep];
}
