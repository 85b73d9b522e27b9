import { homedir } from "node:os";
import { join } from "node:path";

// OSRS Wiki real-time prices API
export const WIKI_PRICES_BASE_URL = "https://prices.runescape.wiki/api/v1/osrs";
export const DEFAULT_MIN_INTERVAL_MS = 1000; // between request starts
export const USER_AGENT_PREFIX = "ge-seer (GE price history + modeling)";

// Local configuration
export const DEFAULT_BASE_DIR = join(homedir(), ".ge-seer");
export const DEFAULT_CONFIG_FILE = join(DEFAULT_BASE_DIR, "config.json");
export const DEFAULT_DATA_DIR = join(homedir(), "ge_seer_data");

// Data directory layout
export const ITEM_MAP_FILE = "item_map.json";
export const PRICES_RAW_DIR = join("prices_raw", "instance");
export const PARTITION_DATA_FILE = "data.parquet";

// Parquet codec
export const INSERT_BATCH_ROWS = 500;

// Error bodies kept for diagnostics
export const ERROR_BODY_EXCERPT_CHARS = 200;
