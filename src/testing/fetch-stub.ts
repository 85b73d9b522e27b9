import { vi } from "vitest";
import type { FetchLike } from "../services/wiki-prices.js";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A fetch stand-in that answers every call with the same JSON body. */
export function stubFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => jsonResponse(body, status));
}
