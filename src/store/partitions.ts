import { randomUUID } from "node:crypto";
import { access, mkdir, readdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { PARTITION_DATA_FILE, PRICES_RAW_DIR } from "../config/constants.js";
import type { Timestep } from "../config/timesteps.js";
import { StorageError, errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { PriceRecord, PriceSnapshot } from "../utils/types.js";
import { readPriceParquet, writePriceParquet } from "./parquet.js";

const log = createLogger("partitions");

const TIME_DIR_PATTERN = /^time=(\d+)$/;

export function pricesRoot(dataDir: string): string {
  return join(dataDir, PRICES_RAW_DIR);
}

export function timestepDir(dataDir: string, timestep: Timestep): string {
  return join(pricesRoot(dataDir), `timestep=${timestep}`);
}

export function partitionDir(dataDir: string, timestep: Timestep, time: number): string {
  return join(timestepDir(dataDir, timestep), `time=${time}`);
}

/** `<dataDir>/prices_raw/instance/timestep=<ts>/time=<t>/data.parquet` */
export function partitionPath(dataDir: string, timestep: Timestep, time: number): string {
  return join(partitionDir(dataDir, timestep, time), PARTITION_DATA_FILE);
}

/** Creates the partition root. Call once before the first write. */
export async function ensureStorageRoot(dataDir: string): Promise<string> {
  const root = pricesRoot(dataDir);
  try {
    await mkdir(root, { recursive: true });
  } catch (err) {
    throw new StorageError(`Failed to create storage root ${root}: ${errorMessage(err)}`, {
      path: root,
      cause: err,
    });
  }
  return root;
}

/**
 * Persists a snapshot as the single data file of its partition. The file is
 * written beside the target and renamed over it, so readers see either the old
 * or the new content. Concurrent writes to the same partition are not supported.
 */
export async function writeSnapshot(snapshot: PriceSnapshot, dataDir: string): Promise<string> {
  const dir = partitionDir(dataDir, snapshot.timestep, snapshot.time);
  const target = join(dir, PARTITION_DATA_FILE);
  const tmp = join(dir, `.${PARTITION_DATA_FILE}.${randomUUID()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new StorageError(`Failed to create partition directory ${dir}: ${errorMessage(err)}`, {
      path: dir,
      cause: err,
    });
  }

  try {
    await writePriceParquet(snapshot.rows, tmp);
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true }).catch((rmErr: unknown) => {
      log.warn("Failed to remove temporary file", { path: tmp, error: errorMessage(rmErr) });
    });
    throw new StorageError(`Failed to write ${target}: ${errorMessage(err)}`, {
      path: target,
      cause: err,
    });
  }

  log.info("Wrote snapshot partition", {
    timestep: snapshot.timestep,
    time: snapshot.time,
    rows: snapshot.rows.length,
    path: target,
  });
  return target;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function hasSnapshot(dataDir: string, timestep: Timestep, time: number): Promise<boolean> {
  return exists(partitionPath(dataDir, timestep, time));
}

/** Returns null when the partition has not been stored. */
export async function readSnapshot(
  dataDir: string,
  timestep: Timestep,
  time: number,
): Promise<PriceRecord[] | null> {
  const path = partitionPath(dataDir, timestep, time);
  if (!(await exists(path))) return null;

  try {
    return await readPriceParquet(path);
  } catch (err) {
    throw new StorageError(`Failed to read ${path}: ${errorMessage(err)}`, { path, cause: err });
  }
}

/** Stored instants for a timestep, ascending. */
export async function listPartitions(dataDir: string, timestep: Timestep): Promise<number[]> {
  const dir = timestepDir(dataDir, timestep);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw new StorageError(`Failed to list ${dir}: ${errorMessage(err)}`, { path: dir, cause: err });
  }

  const times: number[] = [];
  for (const entry of entries) {
    const match = TIME_DIR_PATTERN.exec(entry);
    if (!match?.[1]) continue;
    const time = Number(match[1]);
    if (await exists(join(dir, entry, PARTITION_DATA_FILE))) {
      times.push(time);
    }
  }
  return times.sort((a, b) => a - b);
}
