import type { PriceSnapshot } from "./types.js";
import type { Timestep } from "../config/timesteps.js";

/** Bad caller input. Always raised before any network access. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export interface TransportErrorDetails {
  url: string;
  status?: number;
  body?: string;
  timestep?: Timestep;
  time?: number;
  cause?: unknown;
}

export class TransportError extends Error {
  readonly url: string;
  readonly status: number | undefined;
  readonly body: string | undefined;
  readonly timestep: Timestep | undefined;
  readonly time: number | undefined;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "TransportError";
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
    this.timestep = details.timestep;
    this.time = details.time;
  }
}

export interface StorageErrorDetails {
  path: string;
  cause?: unknown;
  /** Set when the data was fetched successfully but could not be persisted. */
  snapshot?: PriceSnapshot;
}

export class StorageError extends Error {
  readonly path: string;
  readonly snapshot: PriceSnapshot | undefined;

  constructor(message: string, details: StorageErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "StorageError";
    this.path = details.path;
    this.snapshot = details.snapshot;
  }
}

export class ConfigMissingError extends Error {
  constructor(public readonly configPath: string) {
    super(`Package not configured (no file at ${configPath}). Run 'ge-seer setup' first.`);
    this.name = "ConfigMissingError";
  }
}

export class ConfigInvalidError extends Error {
  constructor(
    public readonly configPath: string,
    reason: string,
  ) {
    super(`Invalid configuration at ${configPath}: ${reason}`);
    this.name = "ConfigInvalidError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
