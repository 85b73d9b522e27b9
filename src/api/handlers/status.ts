import type { Context } from "hono";
import { TIMESTEPS } from "../../config/timesteps.js";
import { listPartitions } from "../../store/partitions.js";
import type { AppEnv } from "../types.js";

export async function healthCheck(c: Context<AppEnv>) {
  const dataDir = c.get("dataDir");
  const counts = await Promise.all(TIMESTEPS.map((step) => listPartitions(dataDir, step)));

  const partitions = Object.fromEntries(TIMESTEPS.map((step, i) => [step, counts[i]?.length ?? 0]));

  return c.json({ status: "ok", partitions });
}
