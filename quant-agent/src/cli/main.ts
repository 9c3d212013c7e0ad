#!/usr/bin/env -S node --import tsx
// CLI entry point
import { run } from "./mod.ts";

try {
  await run(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
