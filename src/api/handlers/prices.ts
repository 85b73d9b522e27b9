import type { Context } from "hono";
import { TIMESTEPS, isTimestep, type Timestep } from "../../config/timesteps.js";
import { listPartitions, readSnapshot } from "../../store/partitions.js";
import { isAligned } from "../../utils/time-grid.js";
import { timestampToDatetime } from "../../utils/datetime.js";
import { HTTPError } from "../middleware.js";
import type { AppEnv } from "../types.js";

function timestepParam(c: Context<AppEnv>): Timestep {
  const value = c.req.param("timestep") ?? "";
  if (!isTimestep(value)) {
    throw new HTTPError(400, `Invalid timestep. Allowed: ${TIMESTEPS.join(", ")}`);
  }
  return value;
}

export async function listSnapshots(c: Context<AppEnv>) {
  const timestep = timestepParam(c);
  const times = await listPartitions(c.get("dataDir"), timestep);
  return c.json({ timestep, data: times });
}

export async function getSnapshot(c: Context<AppEnv>) {
  const timestep = timestepParam(c);
  const rawTime = c.req.param("time") ?? "";
  const time = /^\d+$/.test(rawTime) ? Number(rawTime) : NaN;
  if (!isAligned(time, timestep)) {
    throw new HTTPError(400, `Time must be an epoch second aligned to the ${timestep} timestep`);
  }

  const rows = await readSnapshot(c.get("dataDir"), timestep, time);
  if (!rows) throw new HTTPError(404, "Snapshot not stored");

  const itemId = c.req.query("itemId");
  const data = itemId === undefined ? rows : rows.filter((r) => r.itemID === itemId);

  return c.json({ timestep, time, datetime: timestampToDatetime(time), data });
}
