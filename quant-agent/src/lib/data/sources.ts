import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { fetchKrakenOhlc, type FetchLike } from "../api/kraken-public.ts";
import { TtlCache } from "../cache.ts";
import { parseCsvBars, parsePriceSeries, type PriceSeries } from "../types/bar.ts";

/** Where the pipeline gets bars from; everything behind it is I/O */
export interface MarketDataSource {
  readonly name: string;
  fetchBars(symbol: string, intervalMinutes: number): Promise<PriceSeries>;
}

export class KrakenDataSource implements MarketDataSource {
  readonly name = "kraken";
  private readonly fetchImpl?: FetchLike;

  constructor(fetchImpl?: FetchLike) {
    this.fetchImpl = fetchImpl;
  }

  async fetchBars(symbol: string, intervalMinutes: number): Promise<PriceSeries> {
    const bars = await fetchKrakenOhlc(symbol, intervalMinutes, this.fetchImpl);
    return parsePriceSeries(bars);
  }
}

/**
 * Bars from a local file: a JSON array of bars, or CSV with a
 * timestamp,open,high,low,close,volume header. Symbol and interval are
 * ignored since the file holds one series.
 */
export class FileDataSource implements MarketDataSource {
  readonly name = "file";
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async fetchBars(): Promise<PriceSeries> {
    const text = await readFile(this.path, "utf-8");
    const raw: unknown = extname(this.path).toLowerCase() === ".csv" ? parseCsvBars(text) : JSON.parse(text);
    return parsePriceSeries(raw);
  }
}

export interface CacheInfo {
  enabled: boolean;
  ttlSec: number;
  entries: number;
  keys: string[];
}

/**
 * Time-bounded read-through cache in front of another source, keyed by
 * symbol and interval.
 */
export class CachedDataSource implements MarketDataSource {
  readonly name: string;
  private readonly inner: MarketDataSource;
  private readonly ttlSec: number;
  private readonly cache: TtlCache<PriceSeries>;

  constructor(inner: MarketDataSource, ttlSec = 300, now?: () => number) {
    this.name = `cached-${inner.name}`;
    this.inner = inner;
    this.ttlSec = ttlSec;
    this.cache = new TtlCache<PriceSeries>(ttlSec, now);
  }

  async fetchBars(symbol: string, intervalMinutes: number): Promise<PriceSeries> {
    const key = `${symbol}:${intervalMinutes}`;
    const hit = this.cache.get(key);
    if (hit) return hit;

    const series = await this.inner.fetchBars(symbol, intervalMinutes);
    this.cache.set(key, series);
    return series;
  }

  clear(): void {
    this.cache.clear();
  }

  info(): CacheInfo {
    return { enabled: true, ttlSec: this.ttlSec, entries: this.cache.size, keys: this.cache.keys() };
  }
}
