import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod/v4";
import { ITEM_MAP_FILE } from "../config/constants.js";
import type { WikiPricesClient } from "../services/wiki-prices.js";
import { StorageError, errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { ItemMap } from "../utils/types.js";

const log = createLogger("item-map");

const ItemMapSchema = z.record(z.string(), z.string());

export interface GetItemMapOptions {
  dataDir: string;
  client: WikiPricesClient;
  forceRefresh?: boolean;
}

export function itemMapPath(dataDir: string): string {
  return join(dataDir, ITEM_MAP_FILE);
}

/** Reads the cached map; null when it has not been fetched yet. */
export async function readItemMap(dataDir: string): Promise<ItemMap | null> {
  const path = itemMapPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw new StorageError(`Failed to read ${path}: ${errorMessage(err)}`, { path, cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(`Cached item map ${path} is not valid JSON`, { path, cause: err });
  }

  const parsed = ItemMapSchema.safeParse(json);
  if (!parsed.success) {
    throw new StorageError(`Cached item map ${path} is not an id-to-name object`, { path });
  }
  return parsed.data;
}

async function writeItemMap(path: string, map: ItemMap): Promise<void> {
  const tmp = join(dirname(path), `.${ITEM_MAP_FILE}.${randomUUID()}.tmp`);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, JSON.stringify(map, null, 4), "utf-8");
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true }).catch((rmErr: unknown) => {
      log.warn("Failed to remove temporary file", { path: tmp, error: errorMessage(rmErr) });
    });
    throw new StorageError(`Failed to write ${path}: ${errorMessage(err)}`, { path, cause: err });
  }
}

/**
 * Item ID to name. Fetched from the mapping endpoint on first use (or when
 * `forceRefresh` is set) and served from `<dataDir>/item_map.json` afterwards.
 */
export async function getItemMap(opts: GetItemMapOptions): Promise<ItemMap> {
  if (!opts.forceRefresh) {
    const cached = await readItemMap(opts.dataDir);
    if (cached) {
      log.debug("Loaded cached item map", { items: Object.keys(cached).length });
      return cached;
    }
  }

  const entries = await opts.client.fetchMapping();
  const map: ItemMap = {};
  for (const entry of entries) {
    map[String(entry.id)] = entry.name;
  }

  const path = itemMapPath(opts.dataDir);
  await writeItemMap(path, map);
  log.info("Refreshed item map", { items: entries.length, path });
  return map;
}
