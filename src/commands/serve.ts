import { serve } from "@hono/node-server";
import { createApp } from "../api/router.js";
import { getConfigPath, loadConfig } from "../config/manager.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("serve-cmd");

interface ServeOptions {
  config?: string;
  port: number;
}

export async function serveCommand(opts: ServeOptions): Promise<void> {
  const config = await loadConfig(getConfigPath(opts.config));
  const app = createApp(config.data_dir);

  log.info("Starting HTTP server", { port: opts.port, dataDir: config.data_dir });
  console.log(`Server running at http://localhost:${opts.port}/api/v1/status`);
  console.log(`Data directory: ${config.data_dir}`);

  serve({ fetch: app.fetch, port: opts.port });
}
