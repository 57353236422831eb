#!/usr/bin/env node
// CLI entry: `storyfeed generate` writes the feed once, `storyfeed serve` keeps it fresh over HTTP

import "dotenv/config";
import { loadConfig } from "./config/env.js";
import { generateFeed } from "./feeder/index.js";
import { startServer } from "./app/index.js";
import { logger, errorMessage } from "./logger/index.js";


const USAGE = "usage: storyfeed [generate|serve]";


async function main(argv: string[]): Promise<number> {
  const command = argv[0] ?? "generate";
  if (command === "--help" || command === "-h") {
    console.log(USAGE);
    return 0;
  }
  const config = loadConfig();
  if (command === "generate") {
    const result = await generateFeed(config);
    logger.info("app", `RSS feed generated: ${result.outputPath}`, { items: result.itemCount });
    return 0;
  }
  if (command === "serve") {
    await startServer(config);
    return 0;
  }
  console.error(USAGE);
  return 2;
}


main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (err: unknown) => {
    logger.error("app", "run failed", { err: errorMessage(err) });
    process.exitCode = 1;
  },
);
