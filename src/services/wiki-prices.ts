import { z } from "zod/v4";
import { ERROR_BODY_EXCERPT_CHARS, WIKI_PRICES_BASE_URL } from "../config/constants.js";
import type { Timestep } from "../config/timesteps.js";
import { TransportError, errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { RateLimiter, getSharedRateLimiter } from "../utils/rate-limiter.js";
import type {
  PriceRecord,
  PriceSnapshot,
  WikiMappingEntry,
  WikiTimeseriesEntry,
  WikiTimeseriesResponse,
} from "../utils/types.js";

const log = createLogger("wiki-prices");

const NullableInt = z.number().int().nullable().optional();

const TimeseriesEntrySchema = z.object({
  avgHighPrice: NullableInt,
  highPriceVolume: NullableInt,
  avgLowPrice: NullableInt,
  lowPriceVolume: NullableInt,
});

const TimeseriesResponseSchema = z.object({
  data: z.record(z.string().regex(/^\d+$/), TimeseriesEntrySchema),
  timestamp: z.number().int().optional(),
});

const MappingResponseSchema = z.array(
  z.object({
    id: z.number().int(),
    name: z.string(),
    examine: z.string().optional(),
    members: z.boolean().optional(),
    lowalch: z.number().optional(),
    highalch: z.number().optional(),
    limit: z.number().optional(),
    value: z.number().optional(),
    icon: z.string().optional(),
  }),
);

/** Subset of `fetch` the client relies on, so tests can hand in a stub. */
export type FetchLike = (
  url: string,
  init: { headers: Record<string, string> },
) => Promise<Response>;

export interface WikiPricesClientOptions {
  userAgent: string;
  baseUrl?: string;
  limiter?: RateLimiter;
  fetchImpl?: FetchLike;
}

interface RequestContext {
  timestep?: Timestep;
  time?: number;
}

interface ApiResponse {
  status: number;
  body: unknown;
}

function excerpt(body: unknown): string {
  return JSON.stringify(body).slice(0, ERROR_BODY_EXCERPT_CHARS);
}

export class WikiPricesClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly limiter: RateLimiter;
  private readonly fetchImpl: FetchLike;

  constructor(opts: WikiPricesClientOptions) {
    if (opts.userAgent.trim() === "") {
      throw new Error("WikiPricesClient requires a non-empty User-Agent");
    }
    this.baseUrl = opts.baseUrl ?? WIKI_PRICES_BASE_URL;
    this.userAgent = opts.userAgent;
    this.limiter = opts.limiter ?? getSharedRateLimiter();
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  snapshotUrl(timestep: Timestep, time: number): string {
    return `${this.baseUrl}/${timestep}?timestamp=${time}`;
  }

  /** Fetches one averaged price snapshot. `time` must already be on the timestep's grid. */
  async fetchSnapshot(timestep: Timestep, time: number): Promise<PriceSnapshot> {
    const url = this.snapshotUrl(timestep, time);
    log.info("Fetching price snapshot", { timestep, time });

    const { status, body } = await this.request(url, { timestep, time });
    const parsed = TimeseriesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Unexpected response shape from ${url}: ${parsed.error.message}`, {
        url,
        status,
        body: excerpt(body),
        timestep,
        time,
      });
    }

    const rows = toPriceRecords(parsed.data, timestep, time);
    log.info("Fetched price snapshot", { timestep, time, rows: rows.length });
    return { timestep, time, rows };
  }

  async fetchMapping(): Promise<WikiMappingEntry[]> {
    const url = `${this.baseUrl}/mapping`;
    log.info("Fetching item mapping");

    const { status, body } = await this.request(url, {});
    const parsed = MappingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Unexpected response shape from ${url}: ${parsed.error.message}`, {
        url,
        status,
        body: excerpt(body),
      });
    }
    return parsed.data;
  }

  private async request(url: string, context: RequestContext): Promise<ApiResponse> {
    let resp: Response;
    try {
      resp = await this.limiter.run(() => {
        log.debug("GET", { url });
        return this.fetchImpl(url, {
          headers: {
            "User-Agent": this.userAgent,
            Accept: "application/json",
          },
        });
      });
    } catch (err) {
      log.error("Request failed", { url, error: errorMessage(err) });
      throw new TransportError(`Request to ${url} failed: ${errorMessage(err)}`, {
        url,
        cause: err,
        ...context,
      });
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      const bodyExcerpt = text.slice(0, ERROR_BODY_EXCERPT_CHARS);
      log.error("Prices API error", { status: resp.status, url, body: bodyExcerpt });
      throw new TransportError(`Prices API error: ${resp.status} for ${url}`, {
        url,
        status: resp.status,
        body: bodyExcerpt,
        ...context,
      });
    }

    try {
      return { status: resp.status, body: await resp.json() };
    } catch (err) {
      throw new TransportError(`Response from ${url} is not valid JSON`, {
        url,
        status: resp.status,
        cause: err,
        ...context,
      });
    }
  }
}

/** One row per item; fields the API leaves out stay null. */
export function toPriceRecords(
  response: WikiTimeseriesResponse,
  timestep: Timestep,
  time: number,
): PriceRecord[] {
  return Object.entries(response.data).map(([itemID, entry]: [string, WikiTimeseriesEntry]) => ({
    itemID,
    avgHighPrice: entry.avgHighPrice ?? null,
    highPriceVolume: entry.highPriceVolume ?? null,
    avgLowPrice: entry.avgLowPrice ?? null,
    lowPriceVolume: entry.lowPriceVolume ?? null,
    timestep,
    time,
  }));
}
