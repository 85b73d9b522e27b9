import { describe, it, expect } from "vitest";
import { TIMESTEPS } from "../config/timesteps.js";
import { InvalidArgumentError } from "./errors.js";
import { floorToGrid, isAligned, latestCompleteInstant, resolveInstant } from "./time-grid.js";

// 2023-11-14 00:00:00 UTC, on every grid
const MIDNIGHT = 1699920000;

describe("resolveInstant", () => {
  it("returns an aligned timestamp unchanged for every timestep", () => {
    for (const step of TIMESTEPS) {
      expect(resolveInstant(step, { time: MIDNIGHT })).toBe(MIDNIGHT);
    }
  });

  it("accepts 22:00 UTC on the 1h grid", () => {
    expect(resolveInstant("1h", { time: 1699999200 })).toBe(1699999200);
  });

  it("rejects a timestamp off the 1h grid and names the timestep", () => {
    expect(() => resolveInstant("1h", { time: 1700000400 })).toThrow(InvalidArgumentError);
    expect(() => resolveInstant("1h", { time: 1700000400 })).toThrow(
      "Timestamp 1700000400 is not aligned to the 1h timestep (multiple of 3600s required)",
    );
  });

  it("accepts the same timestamp on the 5m grid", () => {
    expect(resolveInstant("5m", { time: 1700000400 })).toBe(1700000400);
  });

  it("rejects one second past an aligned instant for every timestep", () => {
    for (const step of TIMESTEPS) {
      expect(() => resolveInstant(step, { time: MIDNIGHT + 1 })).toThrow(InvalidArgumentError);
    }
  });

  it("converts a datetime string before checking alignment", () => {
    expect(resolveInstant("1h", { datetime: "2023-11-14 22:00:00 UTC" })).toBe(1699999200);
    expect(() => resolveInstant("1h", { datetime: "2023-11-14 22:20:00 UTC" })).toThrow(
      /not aligned to the 1h timestep/,
    );
  });

  it("rejects a datetime string in the wrong format", () => {
    expect(() => resolveInstant("1h", { datetime: "2023-11-14T22:00:00Z" })).toThrow(
      InvalidArgumentError,
    );
  });

  it("rejects both inputs at once", () => {
    expect(() =>
      resolveInstant("1h", { time: 1699999200, datetime: "2023-11-14 22:00:00 UTC" }),
    ).toThrow("Provide either a timestamp or a datetime string, not both");
  });

  it("rejects neither input", () => {
    expect(() => resolveInstant("1h", {})).toThrow("Provide a timestamp or a datetime string");
  });

  it("rejects fractional and negative timestamps", () => {
    expect(() => resolveInstant("5m", { time: 1699999200.5 })).toThrow(InvalidArgumentError);
    expect(() => resolveInstant("5m", { time: -300 })).toThrow(InvalidArgumentError);
  });
});

describe("isAligned", () => {
  it("checks grid membership", () => {
    expect(isAligned(1699999200, "1h")).toBe(true);
    expect(isAligned(1700000400, "1h")).toBe(false);
    expect(isAligned(1700000400, "5m")).toBe(true);
  });
});

describe("floorToGrid", () => {
  it("rounds down to the bucket start", () => {
    expect(floorToGrid(1700000400, "1h")).toBe(1699999200);
    expect(floorToGrid(1700000400, "6h")).toBe(1699984800);
    expect(floorToGrid(1700000400, "24h")).toBe(MIDNIGHT);
  });

  it("leaves aligned values alone", () => {
    expect(floorToGrid(1699999200, "1h")).toBe(1699999200);
  });
});

describe("latestCompleteInstant", () => {
  it("returns the start of the last fully elapsed bucket", () => {
    expect(latestCompleteInstant("1h", 1700000400)).toBe(1699995600);
    expect(latestCompleteInstant("5m", 1700000400)).toBe(1700000100);
  });
});
