import { getConfigPath, loadConfig } from "../config/manager.js";
import { getItemMap, itemMapPath } from "../processors/item-map.js";
import { WikiPricesClient } from "../services/wiki-prices.js";
import { InvalidArgumentError } from "../utils/errors.js";

interface ItemsOptions {
  config?: string;
  refresh?: boolean;
  id?: string;
}

export async function itemsCommand(opts: ItemsOptions): Promise<void> {
  const config = await loadConfig(getConfigPath(opts.config));
  const client = new WikiPricesClient({ userAgent: config.user_agent });

  const map = await getItemMap({
    dataDir: config.data_dir,
    client,
    forceRefresh: opts.refresh ?? false,
  });

  if (opts.id !== undefined) {
    const name = map[opts.id];
    if (name === undefined) {
      throw new InvalidArgumentError(`Unknown item ID ${opts.id}`);
    }
    console.log(`${opts.id}\t${name}`);
    return;
  }

  console.log(`Items: ${Object.keys(map).length.toLocaleString()}`);
  console.log(`Cache: ${itemMapPath(config.data_dir)}`);
}
