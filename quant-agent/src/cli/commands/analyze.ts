import { QuantAgent } from "../../agent.ts";
import { JsonlAuditLog } from "../../audit/logger.ts";
import { apiKeyFor, config, type EngineConfig, loadEngineConfig, validateConfig } from "../../config.ts";
import { createReasoningService } from "../../decision/reasoning.ts";
import { DecisionSynthesizer } from "../../decision/synthesizer.ts";
import { type AnalysisResult, formatDecisionSummary } from "../../report/assembler.ts";
import { booleanFlag, type Flags, numberFlag, stringFlag } from "../utils/flags.ts";
import { createDataSource } from "./source.ts";
import { formatTimeframeTable } from "./trend.ts";

function createSynthesizer(engine: EngineConfig, audit?: JsonlAuditLog): DecisionSynthesizer | null {
  try {
    validateConfig(engine.llm);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[decision] ${message}; decisions will fall back to HOLD`);
    return null;
  }
  const service = createReasoningService(engine.llm, apiKeyFor(engine.llm.provider));
  return new DecisionSynthesizer({ llm: engine.llm, service, audit });
}

export function printReport(result: AnalysisResult): void {
  const { trend, indicator, pattern, summary, decision } = result;

  console.log(`\n=== ${result.symbol} ===`);
  console.log(`Bars: ${result.dataPoints}  Price: ${result.currentPrice.toFixed(2)}  Change: ${result.priceChange.toFixed(2)}%`);
  console.log("");

  formatTimeframeTable(trend).forEach((l) => console.log(l));

  console.log("");
  console.log(`Trend: ${trend.direction} (confidence ${trend.confidence.toFixed(2)})`);
  console.log(`Indicators: ${indicator.forecast} | ${indicator.evidence}`);
  console.log(`Pattern: ${pattern.trend}, ${pattern.priceAction.pattern}, volatility ${pattern.volatility.toFixed(2)}%`);
  console.log("");
  console.log(formatDecisionSummary(decision.record));
  console.log("");
  console.log(`Overall: ${summary.overallSentiment} (${(summary.overallConfidence * 100).toFixed(1)}%)`);
  for (const insight of summary.keyInsights) {
    console.log(`  - ${insight}`);
  }
}

export async function handleAnalyze(symbol: string | undefined, flags: Flags): Promise<void> {
  if (!symbol) {
    console.error("Usage: quant analyze <symbol> [--file <path>] [--interval <minutes>] [--config <path>] [--json] [--audit]");
    process.exit(1);
  }

  const engine = await loadEngineConfig(stringFlag(flags, "config") ?? config.configPath);
  const interval = numberFlag(flags, "interval") ?? engine.data.intervalMinutes;

  let audit: JsonlAuditLog | undefined;
  if (booleanFlag(flags, "audit") || engine.audit.enabled) {
    audit = new JsonlAuditLog({ logsPath: engine.audit.logsPath });
    await audit.open();
    console.log(`[audit] Logging to ${audit.path}`);
  }

  const agent = new QuantAgent({
    dataSource: createDataSource(engine, stringFlag(flags, "file")),
    synthesizer: createSynthesizer(engine, audit),
    minBars: engine.data.minBars,
  });

  try {
    const outcome = await agent.analyzeSymbol(symbol, interval);

    if (booleanFlag(flags, "json")) {
      console.log(JSON.stringify(outcome, null, 2));
    } else if (outcome.success) {
      printReport(outcome);
    }

    if (!outcome.success) {
      console.error(outcome.error);
      process.exitCode = 1;
    }
  } finally {
    await audit?.close();
  }
}
