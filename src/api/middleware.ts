import type { Context, Next } from "hono";
import { cors } from "hono/cors";
import { createLogger } from "../utils/logger.js";
import type { AppEnv } from "./types.js";

const log = createLogger("api");

export function corsMiddleware() {
  return cors({
    origin: (origin) => {
      try {
        const { hostname } = new URL(origin);
        if (hostname === "localhost" || hostname === "127.0.0.1") {
          return origin;
        }
      } catch {
        // not a URL; fall through to deny
      }
      return undefined;
    },
  });
}

export function errorHandler(err: Error, c: Context<AppEnv>) {
  const status = err instanceof HTTPError ? err.status : 500;
  const message = err instanceof HTTPError ? err.message : "Internal server error";

  log.error("Request failed", {
    path: c.req.path,
    method: c.req.method,
    status,
    error: err.message,
  });

  return c.json({ error: message }, status);
}

export async function requestLogger(c: Context<AppEnv>, next: Next) {
  const start = Date.now();
  await next();
  const duration = Date.now() - start;

  log.info("Request", {
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    duration,
  });
}

export class HTTPError extends Error {
  constructor(
    public status: 400 | 404,
    message: string,
  ) {
    super(message);
    this.name = "HTTPError";
  }
}
