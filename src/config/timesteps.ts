export const TIMESTEPS = ["5m", "1h", "6h", "24h"] as const;

export type Timestep = (typeof TIMESTEPS)[number];

/** Bucket width of each timestep, in seconds. */
export const TIMESTEP_SECONDS: Readonly<Record<Timestep, number>> = {
  "5m": 300,
  "1h": 3600,
  "6h": 21600,
  "24h": 86400,
};

export function isTimestep(value: string): value is Timestep {
  return (TIMESTEPS as readonly string[]).includes(value);
}

export function timestepSeconds(timestep: Timestep): number {
  return TIMESTEP_SECONDS[timestep];
}
