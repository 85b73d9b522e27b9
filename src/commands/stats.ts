import { getConfigPath, loadConfig } from "../config/manager.js";
import { TIMESTEPS } from "../config/timesteps.js";
import { readItemMap } from "../processors/item-map.js";
import { listPartitions, pricesRoot } from "../store/partitions.js";
import { timestampToDatetime } from "../utils/datetime.js";

interface StatsOptions {
  config?: string;
}

export async function statsCommand(opts: StatsOptions): Promise<void> {
  const configPath = getConfigPath(opts.config);
  const config = await loadConfig(configPath);
  const itemMap = await readItemMap(config.data_dir);

  console.log(`\n=== GE Seer Data ===`);
  console.log(`Config:  ${configPath}`);
  console.log(`Data:    ${config.data_dir}`);
  console.log(`Prices:  ${pricesRoot(config.data_dir)}`);
  console.log(`Items:   ${itemMap ? Object.keys(itemMap).length.toLocaleString() : "not cached"}\n`);

  console.log("── Partitions ──────────────────────");
  for (const step of TIMESTEPS) {
    const times = await listPartitions(config.data_dir, step);
    const first = times[0];
    const last = times[times.length - 1];
    const range =
      first !== undefined && last !== undefined
        ? `${timestampToDatetime(first)} → ${timestampToDatetime(last)}`
        : "none";
    console.log(`  ${step.padEnd(4)} ${times.length.toLocaleString().padStart(7)}  ${range}`);
  }

  console.log("");
}
