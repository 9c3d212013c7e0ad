import { config, loadEngineConfig } from "../../config.ts";
import { TrendAnalyzer } from "../../trend/analyzer.ts";
import type { Timeframe, TrendReport } from "../../trend/types.ts";
import { booleanFlag, type Flags, numberFlag, stringFlag } from "../utils/flags.ts";
import { createDataSource } from "./source.ts";

const TIMEFRAMES: readonly Timeframe[] = ["short", "medium", "long"];
const COLUMNS = ["TIMEFRAME", "DIRECTION", "SLOPE", "R2", "STRENGTH"];

/** One aligned row per timeframe under a dashed header */
export function formatTimeframeTable(report: TrendReport): string[] {
  const rows = TIMEFRAMES.map((tf) => {
    const reading = report.timeframes[tf];
    return [tf, reading.direction, reading.slope.toFixed(4), reading.fitQuality.toFixed(2), reading.strengthLabel];
  });
  const widths = COLUMNS.map((col, i) => Math.max(col.length, ...rows.map((r) => r[i].length)));
  const align = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd();

  return [align(COLUMNS), widths.map((w) => "-".repeat(w)).join("  "), ...rows.map(align)];
}

export function trendLines(report: TrendReport): string[] {
  const { agreement, strength, momentum } = report.confidenceFactors;
  return [
    ...formatTimeframeTable(report),
    "",
    report.summary,
    "",
    `Direction: ${report.direction}`,
    `Confidence: ${report.confidence.toFixed(2)} (agreement ${agreement.toFixed(2)} + strength ${strength.toFixed(2)} + momentum ${momentum.toFixed(2)})`,
  ];
}

export async function handleTrend(symbol: string | undefined, flags: Flags): Promise<void> {
  if (!symbol) {
    console.error("Usage: quant trend <symbol> [--file <path>] [--interval <minutes>] [--json]");
    process.exit(1);
  }

  const engine = await loadEngineConfig(stringFlag(flags, "config") ?? config.configPath);
  const interval = numberFlag(flags, "interval") ?? engine.data.intervalMinutes;
  const source = createDataSource(engine, stringFlag(flags, "file"));

  const series = await source.fetchBars(symbol, interval);
  const report = new TrendAnalyzer().analyze(series);

  if (booleanFlag(flags, "json")) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(`[trend] ${symbol}: ${series.length} bars`);
  trendLines(report).forEach((l) => console.log(l));
}
