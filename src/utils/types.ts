import type { Timestep } from "../config/timesteps.js";

// OSRS Wiki prices API response types
export interface WikiTimeseriesEntry {
  avgHighPrice?: number | null;
  highPriceVolume?: number | null;
  avgLowPrice?: number | null;
  lowPriceVolume?: number | null;
}

export interface WikiTimeseriesResponse {
  data: Record<string, WikiTimeseriesEntry>;
  timestamp?: number;
}

export interface WikiMappingEntry {
  id: number;
  name: string;
  examine?: string;
  members?: boolean;
  lowalch?: number;
  highalch?: number;
  limit?: number;
  value?: number;
  icon?: string;
}

/** Item ID (as a decimal string) to item name. */
export type ItemMap = Record<string, string>;

// Stored snapshot rows
export interface PriceRecord {
  itemID: string;
  avgHighPrice: number | null;
  highPriceVolume: number | null;
  avgLowPrice: number | null;
  lowPriceVolume: number | null;
  timestep: Timestep;
  time: number;
}

/** All rows returned for one (timestep, time) partition key. */
export interface PriceSnapshot {
  timestep: Timestep;
  time: number;
  rows: PriceRecord[];
}

export interface PartitionKey {
  timestep: Timestep;
  time: number;
}

export interface GeSeerConfig {
  user_agent: string;
  data_dir: string;
}
