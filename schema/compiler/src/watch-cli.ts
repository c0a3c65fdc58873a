#!/usr/bin/env node
/**
 * Entity SQL generator watch CLI
 *
 * Usage:
 *   entity-sqlgen-watch <input.yaml> [output-dir] [--strict]
 */

import { watchSchema } from "./watcher.js";

function main() {
  const args = process.argv.slice(2);
  const strict = args.includes("--strict");
  const positional = args.filter((arg) => !arg.startsWith("--"));

  if (positional.length === 0) {
    console.error("Usage: entity-sqlgen-watch <input.yaml|input.json> [output-dir] [--strict]");
    console.error("");
    console.error("Examples:");
    console.error("  entity-sqlgen-watch schema.yaml");
    console.error("  entity-sqlgen-watch schema.json ./generated");
    process.exit(1);
  }

  const inputFile = positional[0];
  const outputDir = positional[1] || "./generated";

  try {
    const watcher = watchSchema({ inputFile, outputDir, strict });

    // Handle graceful shutdown
    process.on("SIGINT", () => {
      console.log("\n👋 Stopping watcher...");
      watcher.stop();
      process.exit(0);
    });

    process.on("SIGTERM", () => {
      watcher.stop();
      process.exit(0);
    });
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();
