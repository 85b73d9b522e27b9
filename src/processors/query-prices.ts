import type { Timestep } from "../config/timesteps.js";
import type { WikiPricesClient } from "../services/wiki-prices.js";
import { writeSnapshot } from "../store/partitions.js";
import { StorageError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { resolveInstant, type InstantInput } from "../utils/time-grid.js";
import type { PriceSnapshot } from "../utils/types.js";

const log = createLogger("query-prices");

export interface QueryPricesOptions extends InstantInput {
  timestep: Timestep;
  client: WikiPricesClient;
  /** Data directory from the loaded configuration. */
  dataDir: string;
  /** Persist the snapshot to its partition (default true). */
  store?: boolean;
}

export interface QueryPricesResult extends PriceSnapshot {
  /** Written partition file, or null when storage was skipped. */
  path: string | null;
}

/**
 * Resolves the instant, fetches one snapshot through the client's rate limiter
 * and, unless told otherwise, persists it. A failed write raises StorageError
 * with the fetched snapshot attached.
 */
export async function queryPrices(opts: QueryPricesOptions): Promise<QueryPricesResult> {
  const time = resolveInstant(opts.timestep, { time: opts.time, datetime: opts.datetime });
  const snapshot = await opts.client.fetchSnapshot(opts.timestep, time);

  if (opts.store === false) {
    return { ...snapshot, path: null };
  }

  try {
    const path = await writeSnapshot(snapshot, opts.dataDir);
    return { ...snapshot, path };
  } catch (err) {
    if (!(err instanceof StorageError)) throw err;
    log.error("Snapshot fetched but not stored", {
      timestep: snapshot.timestep,
      time: snapshot.time,
      rows: snapshot.rows.length,
      path: err.path,
      error: err.message,
    });
    throw new StorageError(err.message, { path: err.path, cause: err, snapshot });
  }
}
