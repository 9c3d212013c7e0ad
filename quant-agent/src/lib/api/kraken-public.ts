/**
 * Minimal Kraken public REST client for OHLC bars
 */
import type { Bar } from "../types/bar.ts";

const KRAKEN_OHLC_URL = "https://api.kraken.com/0/public/OHLC";

export const KRAKEN_INTERVALS = [1, 5, 15, 30, 60, 240, 1440, 10080, 21600] as const;

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

interface KrakenResponse {
  error?: string[];
  result?: Record<string, unknown>;
}

function isKrakenResponse(value: unknown): value is KrakenResponse {
  return typeof value === "object" && value !== null;
}

/**
 * Fetch OHLC bars for a Kraken pair at `interval` minutes.
 * The last row Kraken returns is the still-forming bar and is dropped.
 */
export async function fetchKrakenOhlc(
  pair: string,
  interval: number,
  fetchImpl: FetchLike = fetch,
): Promise<Bar[]> {
  if (!KRAKEN_INTERVALS.some((i) => i === interval)) {
    throw new Error(`Unsupported Kraken interval: ${interval} (use one of ${KRAKEN_INTERVALS.join(", ")})`);
  }

  const params = new URLSearchParams({ pair, interval: String(interval) });
  const res = await fetchImpl(`${KRAKEN_OHLC_URL}?${params}`, {
    signal: AbortSignal.timeout(30000),
  });
  if (!res.ok) {
    throw new Error(`Kraken OHLC API error: ${res.status}`);
  }

  const data = await res.json();
  if (!isKrakenResponse(data)) {
    throw new Error("Kraken OHLC API returned a non-object body");
  }
  if (data.error && data.error.length > 0) {
    throw new Error(`Kraken API errors: ${data.error.join(", ")}`);
  }

  // Response format: { result: { "XXBTZUSD": [[time, open, high, low, close, vwap, volume, count], ...], last: 1700000000 } }
  const result = data.result ?? {};
  const key = Object.keys(result).find((k) => k !== "last");
  const rows = key ? result[key] : [];
  if (!Array.isArray(rows)) {
    throw new Error(`Kraken OHLC API returned no rows for ${pair}`);
  }

  return rows.slice(0, -1).map((row: unknown) => {
    if (!Array.isArray(row) || row.length < 7) {
      throw new Error(`Malformed Kraken OHLC row: ${JSON.stringify(row)}`);
    }
    return {
      timestamp: Number(row[0]) * 1000,
      open: Number(row[1]),
      high: Number(row[2]),
      low: Number(row[3]),
      close: Number(row[4]),
      volume: Number(row[6]),
    };
  });
}
