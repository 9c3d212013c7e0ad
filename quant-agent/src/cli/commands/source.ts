import type { EngineConfig } from "../../config.ts";
import {
  CachedDataSource,
  FileDataSource,
  KrakenDataSource,
  type MarketDataSource,
} from "../../lib/data/sources.ts";

/** Bars from --file when given, the Kraken public API otherwise */
export function createDataSource(engine: EngineConfig, file?: string): MarketDataSource {
  const source = file ? new FileDataSource(file) : new KrakenDataSource();
  return engine.data.cacheEnabled ? new CachedDataSource(source, engine.data.cacheTtlSec) : source;
}
