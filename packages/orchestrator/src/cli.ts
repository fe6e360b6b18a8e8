#!/usr/bin/env tsx
import { ConfigError, type Item, createLogger, formatStageError } from "@importline/core";
import { CatalogSource } from "@importline/sources";
import { getConfig } from "./config";
import { Importer } from "./importer";
import { ItemStore } from "./store";

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.log(`
importline <command>

Commands:
  scan <catalog.json...>   Import the items listed in one or more catalog files
  help                     Show this message

Environment:
  IMPORTLINE_LOG_LEVEL   debug, info, warn, error or silent (default: info)
  IMPORTLINE_EXCLUDE     Comma-separated item keys to exclude from the import
  IMPORTLINE_REMOVED     Comma-separated item keys the user has removed
`);
}

async function scan(paths: string[]): Promise<number> {
  const config = getConfig();
  const logger = createLogger({ level: config.logLevel });

  const store = new ItemStore<Item>({
    stages: [],
    excludedKeys: config.excludedKeys,
    removedKeys: config.removedKeys,
    logger,
  });

  let lastShown = "";
  const importer = new Importer<Item>({
    registry: store,
    logger,
    observer: {
      onProgress: (progress) => {
        const pct = (progress * 100).toFixed(1);
        if (pct !== lastShown) {
          lastShown = pct;
          console.log(`[import] ${pct}%`);
        }
      },
      onErrors: (errors) => {
        console.error("The following errors occurred during import:");
        for (const error of errors) {
          console.error(`  ${formatStageError(error)}`);
        }
      },
      onSummary: (message) => console.log(message),
    },
  });

  for (const path of paths) {
    importer.addSource(new CatalogSource(path, { logger }));
  }

  const summary = await importer.run();
  return summary.errors.length > 0 ? 2 : 0;
}

async function main(): Promise<void> {
  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  switch (command) {
    case "scan": {
      const paths = args.slice(1);
      if (paths.length === 0) {
        console.error("scan needs at least one catalog file");
        printUsage();
        process.exit(1);
      }
      process.exit(await scan(paths));
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("Error:", err);
  }
  process.exit(1);
});
