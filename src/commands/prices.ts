import { getConfigPath, loadConfig } from "../config/manager.js";
import { TIMESTEPS, isTimestep } from "../config/timesteps.js";
import { queryPrices } from "../processors/query-prices.js";
import { WikiPricesClient } from "../services/wiki-prices.js";
import { ensureStorageRoot } from "../store/partitions.js";
import { currentTimestamp, timestampToDatetime } from "../utils/datetime.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { latestCompleteInstant } from "../utils/time-grid.js";

interface PricesOptions {
  config?: string;
  timestep: string;
  time?: number;
  datetime?: string;
  latest?: boolean;
  store: boolean;
  json?: boolean;
}

export async function pricesCommand(opts: PricesOptions): Promise<void> {
  const timestep = opts.timestep;
  if (!isTimestep(timestep)) {
    throw new InvalidArgumentError(`Invalid timestep "${timestep}". Allowed: ${TIMESTEPS.join(", ")}`);
  }
  if (opts.latest && (opts.time !== undefined || opts.datetime !== undefined)) {
    throw new InvalidArgumentError("--latest cannot be combined with --time or --datetime");
  }
  const time = opts.latest ? latestCompleteInstant(timestep, currentTimestamp()) : opts.time;

  const config = await loadConfig(getConfigPath(opts.config));
  const client = new WikiPricesClient({ userAgent: config.user_agent });
  if (opts.store) {
    await ensureStorageRoot(config.data_dir);
  }

  const result = await queryPrices({
    timestep,
    time,
    datetime: opts.datetime,
    client,
    dataDir: config.data_dir,
    store: opts.store,
  });

  if (opts.json) {
    console.log(JSON.stringify(result.rows, null, 2));
    return;
  }

  console.log(`Timestep: ${result.timestep}`);
  console.log(`Time:     ${result.time} (${timestampToDatetime(result.time)})`);
  console.log(`Items:    ${result.rows.length.toLocaleString()}`);
  console.log(`Stored:   ${result.path ?? "no (--no-store)"}`);
}
