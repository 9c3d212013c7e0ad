import type { PriceSeries } from "../lib/types/bar.ts";
import type { BreakoutState } from "./types.ts";

const MIN_BARS = 20;
const BAND_BARS = 20;
const BUFFER = 0.001;

/**
 * Compare the last close to the support/resistance band of the most
 * recent 20 bars, the current bar included.
 */
export function detectBreakout(series: PriceSeries): BreakoutState {
  const n = series.length;
  const currentPrice = n > 0 ? series[n - 1].close : 0;

  if (n < MIN_BARS) {
    return {
      status: "Insufficient data",
      strengthPct: 0,
      supportLevel: 0,
      resistanceLevel: 0,
      currentPrice,
    };
  }

  const band = series.slice(-BAND_BARS);
  const supportLevel = Math.min(...band.map((b) => b.low));
  const resistanceLevel = Math.max(...band.map((b) => b.high));

  if (currentPrice > resistanceLevel * (1 + BUFFER)) {
    return {
      status: "ResistanceBreakout",
      strengthPct: ((currentPrice - resistanceLevel) / resistanceLevel) * 100,
      supportLevel,
      resistanceLevel,
      currentPrice,
    };
  }

  if (currentPrice < supportLevel * (1 - BUFFER)) {
    return {
      status: "SupportBreakdown",
      strengthPct: ((supportLevel - currentPrice) / supportLevel) * 100,
      supportLevel,
      resistanceLevel,
      currentPrice,
    };
  }

  return { status: "None", strengthPct: 0, supportLevel, resistanceLevel, currentPrice };
}
