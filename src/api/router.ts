import { Hono } from "hono";
import { corsMiddleware, errorHandler, requestLogger } from "./middleware.js";
import { getItem, listItems } from "./handlers/items.js";
import { getSnapshot, listSnapshots } from "./handlers/prices.js";
import { healthCheck } from "./handlers/status.js";
import type { AppEnv } from "./types.js";

/** Read-only view over a data directory populated by `ge-seer prices` and `ge-seer items`. */
export function createApp(dataDir: string) {
  const app = new Hono<AppEnv>();

  app.use("*", async (c, next) => {
    c.set("dataDir", dataDir);
    await next();
  });

  // Reject requests outside /api/v1 immediately
  app.use("*", async (c, next) => {
    if (!c.req.path.startsWith("/api/v1")) {
      return c.text("Not Found", 404);
    }
    await next();
  });

  app.use("*", corsMiddleware());
  app.use("*", requestLogger);
  app.onError(errorHandler);

  const api = new Hono<AppEnv>();

  api.get("/status", healthCheck);

  api.get("/items", listItems);
  api.get("/items/:itemId", getItem);

  api.get("/prices/:timestep", listSnapshots);
  api.get("/prices/:timestep/:time", getSnapshot);

  app.route("/api/v1", api);

  return app;
}
