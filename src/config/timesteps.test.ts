import { describe, it, expect } from "vitest";
import { TIMESTEPS, TIMESTEP_SECONDS, isTimestep, timestepSeconds } from "./timesteps.js";

describe("TIMESTEPS", () => {
  it("lists the four API granularities in ascending order", () => {
    expect(TIMESTEPS).toEqual(["5m", "1h", "6h", "24h"]);
  });

  it("maps every timestep to its duration in seconds", () => {
    expect(TIMESTEP_SECONDS).toEqual({ "5m": 300, "1h": 3600, "6h": 21600, "24h": 86400 });
  });
});

describe("isTimestep", () => {
  it("accepts known timesteps", () => {
    for (const step of TIMESTEPS) {
      expect(isTimestep(step)).toBe(true);
    }
  });

  it("rejects unknown values", () => {
    expect(isTimestep("1m")).toBe(false);
    expect(isTimestep("1H")).toBe(false);
    expect(isTimestep("")).toBe(false);
  });
});

describe("timestepSeconds", () => {
  it("returns the bucket width", () => {
    expect(timestepSeconds("6h")).toBe(21600);
  });
});
