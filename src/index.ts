export { TIMESTEPS, TIMESTEP_SECONDS, isTimestep, timestepSeconds, type Timestep } from "./config/timesteps.js";
export { buildUserAgent, getConfigPath, loadConfig, saveConfig, type SaveConfigInput } from "./config/manager.js";
export { WikiPricesClient, toPriceRecords, type FetchLike, type WikiPricesClientOptions } from "./services/wiki-prices.js";
export { queryPrices, type QueryPricesOptions, type QueryPricesResult } from "./processors/query-prices.js";
export { getItemMap, readItemMap, itemMapPath, type GetItemMapOptions } from "./processors/item-map.js";
export {
  ensureStorageRoot,
  hasSnapshot,
  listPartitions,
  partitionPath,
  readSnapshot,
  writeSnapshot,
} from "./store/partitions.js";
export { RateLimiter, getSharedRateLimiter, type RateLimiterOptions } from "./utils/rate-limiter.js";
export { resolveInstant, isAligned, floorToGrid, latestCompleteInstant, type InstantInput } from "./utils/time-grid.js";
export { currentTimestamp, datetimeToTimestamp, timestampToDatetime } from "./utils/datetime.js";
export {
  ConfigInvalidError,
  ConfigMissingError,
  InvalidArgumentError,
  StorageError,
  TransportError,
} from "./utils/errors.js";
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./utils/logger.js";
export { createApp } from "./api/router.js";
export type { GeSeerConfig, ItemMap, PartitionKey, PriceRecord, PriceSnapshot } from "./utils/types.js";
