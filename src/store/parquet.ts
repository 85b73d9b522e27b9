import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";
import { INSERT_BATCH_ROWS } from "../config/constants.js";
import { isTimestep } from "../config/timesteps.js";
import type { PriceRecord } from "../utils/types.js";

const TABLE = "snapshot";

const CREATE_TABLE_SQL = `CREATE TABLE ${TABLE} (
  "itemID" VARCHAR NOT NULL,
  "avgHighPrice" BIGINT,
  "highPriceVolume" BIGINT,
  "avgLowPrice" BIGINT,
  "lowPriceVolume" BIGINT,
  "timestep" VARCHAR NOT NULL,
  "time" BIGINT NOT NULL
)`;

function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function intLiteral(value: number | null): string {
  if (value === null) return "NULL";
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`Expected an integer column value, got ${value}`);
  }
  return String(value);
}

function rowLiteral(row: PriceRecord): string {
  return `(${[
    quoteString(row.itemID),
    intLiteral(row.avgHighPrice),
    intLiteral(row.highPriceVolume),
    intLiteral(row.avgLowPrice),
    intLiteral(row.lowPriceVolume),
    quoteString(row.timestep),
    intLiteral(row.time),
  ].join(", ")})`;
}

async function withConnection<T>(fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
  const instance = await DuckDBInstance.create(":memory:");
  const conn = await instance.connect();
  try {
    return await fn(conn);
  } finally {
    conn.closeSync();
    instance.closeSync();
  }
}

/** Writes the rows to a Parquet file at `filePath`, replacing anything already there. */
export async function writePriceParquet(rows: PriceRecord[], filePath: string): Promise<void> {
  await withConnection(async (conn) => {
    await conn.run(CREATE_TABLE_SQL);

    for (let i = 0; i < rows.length; i += INSERT_BATCH_ROWS) {
      const values = rows.slice(i, i + INSERT_BATCH_ROWS).map(rowLiteral).join(",\n");
      await conn.run(`INSERT INTO ${TABLE} VALUES ${values}`);
    }

    await conn.run(`COPY ${TABLE} TO ${quoteString(filePath)} (FORMAT PARQUET)`);
  });
}

function toNullableInt(value: unknown, column: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  throw new TypeError(`Column ${column} holds a non-integer value`);
}

function toText(value: unknown, column: string): string {
  if (typeof value !== "string") {
    throw new TypeError(`Column ${column} holds a non-text value`);
  }
  return value;
}

/** Reads a file written by `writePriceParquet`, ordered by numeric item ID. */
export async function readPriceParquet(filePath: string): Promise<PriceRecord[]> {
  return withConnection(async (conn) => {
    const reader = await conn.runAndReadAll(
      `SELECT "itemID", "avgHighPrice", "highPriceVolume", "avgLowPrice", "lowPriceVolume", "timestep", "time"
       FROM read_parquet(${quoteString(filePath)})
       ORDER BY TRY_CAST("itemID" AS BIGINT) NULLS LAST, "itemID"`,
    );

    return reader.getRowObjects().map((row) => {
      const timestep = toText(row["timestep"], "timestep");
      if (!isTimestep(timestep)) {
        throw new TypeError(`Column timestep holds unknown value "${timestep}"`);
      }
      const time = toNullableInt(row["time"], "time");
      if (time === null) {
        throw new TypeError("Column time is null");
      }
      return {
        itemID: toText(row["itemID"], "itemID"),
        avgHighPrice: toNullableInt(row["avgHighPrice"], "avgHighPrice"),
        highPriceVolume: toNullableInt(row["highPriceVolume"], "highPriceVolume"),
        avgLowPrice: toNullableInt(row["avgLowPrice"], "avgLowPrice"),
        lowPriceVolume: toNullableInt(row["lowPriceVolume"], "lowPriceVolume"),
        timestep,
        time,
      };
    });
  });
}
