import type { Context } from "hono";
import { readItemMap } from "../../processors/item-map.js";
import { HTTPError } from "../middleware.js";
import type { AppEnv } from "../types.js";

async function cachedItemMap(c: Context<AppEnv>) {
  const map = await readItemMap(c.get("dataDir"));
  if (!map) throw new HTTPError(404, "Item map not cached yet; run 'ge-seer items' first");
  return map;
}

export async function listItems(c: Context<AppEnv>) {
  const map = await cachedItemMap(c);
  const data = Object.entries(map).map(([id, name]) => ({ id: Number(id), name }));
  return c.json({ data, total: data.length });
}

export async function getItem(c: Context<AppEnv>) {
  const itemId = c.req.param("itemId") ?? "";
  if (!/^\d+$/.test(itemId)) throw new HTTPError(400, "Invalid item ID");

  const map = await cachedItemMap(c);
  const name = map[itemId];
  if (name === undefined) throw new HTTPError(404, "Item not found");

  return c.json({ data: { id: Number(itemId), name } });
}
