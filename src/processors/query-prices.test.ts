import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { WikiPricesClient } from "../services/wiki-prices.js";
import { partitionPath, readSnapshot } from "../store/partitions.js";
import { stubFetch } from "../testing/fetch-stub.js";
import { InvalidArgumentError, StorageError, TransportError } from "../utils/errors.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { queryPrices } from "./query-prices.js";

const BODY = {
  data: {
    "2": { avgHighPrice: 183, highPriceVolume: 7288 },
    "6": { avgLowPrice: 99 },
  },
};

const EXPECTED_ROWS = [
  {
    itemID: "2",
    avgHighPrice: 183,
    highPriceVolume: 7288,
    avgLowPrice: null,
    lowPriceVolume: null,
    timestep: "1h",
    time: 1699999200,
  },
  {
    itemID: "6",
    avgHighPrice: null,
    highPriceVolume: null,
    avgLowPrice: 99,
    lowPriceVolume: null,
    timestep: "1h",
    time: 1699999200,
  },
];

describe("queryPrices", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "ge-seer-query-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  function setup(body: unknown = BODY, status = 200) {
    const fetchMock = stubFetch(body, status);
    const client = new WikiPricesClient({
      userAgent: "test-agent",
      fetchImpl: fetchMock,
      limiter: new RateLimiter({ minIntervalMs: 0 }),
    });
    return { fetchMock, client };
  }

  it("fetches, reshapes and stores one hourly snapshot", async () => {
    const { fetchMock, client } = setup();

    const result = await queryPrices({ timestep: "1h", time: 1699999200, client, dataDir });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.rows).toEqual(EXPECTED_ROWS);
    expect(result.path).toBe(
      join(dataDir, "prices_raw", "instance", "timestep=1h", "time=1699999200", "data.parquet"),
    );
    expect(await readSnapshot(dataDir, "1h", 1699999200)).toEqual(EXPECTED_ROWS);
  });

  it("accepts a datetime string instead of a timestamp", async () => {
    const { client } = setup();

    const result = await queryPrices({
      timestep: "1h",
      datetime: "2023-11-14 22:00:00 UTC",
      client,
      dataDir,
    });

    expect(result.time).toBe(1699999200);
  });

  it("fails before any network access when both instant forms are given", async () => {
    const { fetchMock, client } = setup();

    await expect(
      queryPrices({
        timestep: "1h",
        time: 1699999200,
        datetime: "2023-11-14 22:00:00 UTC",
        client,
        dataDir,
      }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(fetchMock).toHaveBeenCalledTimes(0);
  });

  it("fails before any network access for a misaligned instant", async () => {
    const { fetchMock, client } = setup();

    await expect(queryPrices({ timestep: "1h", time: 1700000400, client, dataDir })).rejects.toThrow(
      /1h timestep/,
    );
    expect(fetchMock).toHaveBeenCalledTimes(0);
  });

  it("skips storage when asked", async () => {
    const { client } = setup();

    const result = await queryPrices({ timestep: "1h", time: 1699999200, client, dataDir, store: false });

    expect(result.path).toBeNull();
    expect(result.rows).toEqual(EXPECTED_ROWS);
    expect(await readSnapshot(dataDir, "1h", 1699999200)).toBeNull();
  });

  it("writes nothing when the API call fails", async () => {
    const { client } = setup({ error: "down" }, 503);

    await expect(queryPrices({ timestep: "1h", time: 1699999200, client, dataDir })).rejects.toBeInstanceOf(
      TransportError,
    );
    expect(await readSnapshot(dataDir, "1h", 1699999200)).toBeNull();
  });

  it("attaches the fetched snapshot to a storage failure", async () => {
    const { client } = setup();
    const blocked = join(dataDir, "file-not-dir");
    await writeFile(blocked, "x");

    const err = await queryPrices({ timestep: "1h", time: 1699999200, client, dataDir: blocked }).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(StorageError);
    expect(err instanceof StorageError ? err.snapshot?.rows : undefined).toEqual(EXPECTED_ROWS);
  });

  it("replaces the partition on a repeated query", async () => {
    const first = setup({ data: { "2": { avgHighPrice: 100 } } });
    await queryPrices({ timestep: "1h", time: 1699999200, client: first.client, dataDir });

    const second = setup({ data: { "6": { avgLowPrice: 99 } } });
    const result = await queryPrices({ timestep: "1h", time: 1699999200, client: second.client, dataDir });

    expect(result.path).toBe(partitionPath(dataDir, "1h", 1699999200));
    expect(await readSnapshot(dataDir, "1h", 1699999200)).toEqual([EXPECTED_ROWS[1]]);
  });
});
