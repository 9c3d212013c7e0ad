// CLI command router
import minimist from "minimist";
import { VERSION } from "../config.ts";
import { handleAnalyze } from "./commands/analyze.ts";
import { handleTrend } from "./commands/trend.ts";
import { positional } from "./utils/flags.ts";

export async function run(args: string[]): Promise<void> {
  const flags = minimist(args, {
    string: ["_", "file", "config", "interval"],
    boolean: ["help", "version", "json", "audit"],
    alias: { h: "help", v: "version", f: "file", i: "interval", c: "config" },
  });

  const command = positional(flags, 0);

  if (flags.version) {
    console.log(`quant ${VERSION}`);
    return;
  }

  if (flags.help || !command) {
    printHelp();
    return;
  }

  switch (command) {
    case "version":
      console.log(`quant ${VERSION}`);
      break;

    case "analyze":
      await handleAnalyze(positional(flags, 1), flags);
      break;

    case "trend":
      await handleTrend(positional(flags, 1), flags);
      break;

    case "help":
      printHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log("");
      printHelp();
      process.exit(1);
  }
}

function printHelp(): void {
  console.log("quant - multi-timeframe trend analysis and trade decision synthesis");
  console.log("");
  console.log("USAGE:");
  console.log("  quant analyze <symbol> [options]   Full analysis and trading decision");
  console.log("  quant trend <symbol> [options]     Trend report only (no reasoning service)");
  console.log("  quant version");
  console.log("");
  console.log("OPTIONS:");
  console.log("  --file, -f <path>       Read bars from a JSON or CSV file instead of Kraken");
  console.log("  --interval, -i <min>    Bar interval in minutes (default: 1440)");
  console.log("  --config, -c <path>     Engine config (YAML)");
  console.log("  --json                  Print the result as JSON");
  console.log("  --audit                 Write reasoning requests/responses to a JSONL audit log");
  console.log("");
  console.log("ENVIRONMENT:");
  console.log("  ANTHROPIC_API_KEY       Key for the default reasoning provider");
  console.log("  OPENAI_API_KEY          Key when QUANT_LLM_PROVIDER=openai");
  console.log("  QUANT_MODEL             Model id override");
  console.log("  QUANT_LLM_BASE_URL      OpenAI-compatible endpoint (e.g. a Groq URL)");
}
