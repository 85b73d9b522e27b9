#!/usr/bin/env node
import { Command, InvalidArgumentError as InvalidOptionError, Option } from "commander";
import { itemsCommand } from "./commands/items.js";
import { pricesCommand } from "./commands/prices.js";
import { serveCommand } from "./commands/serve.js";
import { setupCommand } from "./commands/setup.js";
import { statsCommand } from "./commands/stats.js";
import { CONTACT_TYPES } from "./config/manager.js";
import { TIMESTEPS } from "./config/timesteps.js";
import { InvalidArgumentError, errorMessage } from "./utils/errors.js";
import { setLogLevel } from "./utils/logger.js";

function parseEpoch(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidOptionError("Expected epoch seconds (a non-negative integer).");
  }
  return Number(value);
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidOptionError("Expected a port between 1 and 65535.");
  }
  return port;
}

/** Prints the failure and sets the exit code: 2 for bad arguments, 1 for everything else. */
function handled<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = err instanceof InvalidArgumentError ? 2 : 1;
    }
  };
}

const program = new Command();

program
  .name("ge-seer")
  .description("Grand Exchange price snapshots from the OSRS Wiki prices API")
  .version("0.1.0")
  .option("--verbose", "Debug logging")
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts().verbose === true) setLogLevel("debug");
  });

program
  .command("setup")
  .description("Write the config file (User-Agent contact and data directory)")
  .option("--config <path>", "Config file path (default ~/.ge-seer/config.json)")
  .option("--contact <value>", "Discord username or email address")
  .addOption(new Option("--contact-type <type>", "How to reach you").choices([...CONTACT_TYPES]))
  .option("--data-dir <path>", "Absolute path for stored datasets")
  .action(handled(setupCommand));

program
  .command("items")
  .description("Load the item ID → name map, fetching it on first use")
  .option("--config <path>", "Config file path (default ~/.ge-seer/config.json)")
  .option("--refresh", "Re-download the map even if cached")
  .option("--id <itemId>", "Print the name of a single item")
  .action(handled(itemsCommand));

program
  .command("prices")
  .description("Fetch one averaged price snapshot and store it as a Parquet partition")
  .option("--config <path>", "Config file path (default ~/.ge-seer/config.json)")
  .addOption(new Option("--timestep <step>", "Averaging interval").choices([...TIMESTEPS]).default("1h"))
  .option("--time <epoch>", "Bucket start in epoch seconds", parseEpoch)
  .option("--datetime <utc>", 'Bucket start as "YYYY-MM-DD HH:MM:SS UTC"')
  .option("--latest", "Most recent fully elapsed bucket")
  .option("--no-store", "Fetch and print without writing a partition")
  .option("--json", "Print the rows as JSON")
  .action(handled(pricesCommand));

program
  .command("stats")
  .description("Print stored partition counts and ranges")
  .option("--config <path>", "Config file path (default ~/.ge-seer/config.json)")
  .action(handled(statsCommand));

program
  .command("serve")
  .description("Start local read-only HTTP API over stored snapshots")
  .option("--config <path>", "Config file path (default ~/.ge-seer/config.json)")
  .option("--port <port>", "Port to listen on", parsePort, 3000)
  .action(handled(serveCommand));

await program.parseAsync();
