#!/usr/bin/env node

import { buildCommand, buildUsage } from "./commands/build.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { createFormatter } from "./format/colors.js";
import { createLogger } from "./logger.js";

const HELP = `
inkwell - build a static site from markdown and mustache layouts

USAGE:
  inkwell build [<project>] [options]

COMMANDS:
  build       Render pages and posts, copy theme assets and write the feed

Run "inkwell build --help" for build options.
`;

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);
  const formatter = createFormatter();

  if (command === "--help" || command === "-h" || command === "help") {
    console.log(HELP);
    return 0;
  }

  if (command !== "build") {
    if (command !== undefined) {
      console.error(`Error: Unknown command: ${command}`);
    }
    console.log(HELP);
    return 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      console.log(buildUsage(formatter));
      return 1;
    }
    throw err;
  }

  return buildCommand(args, {
    formatter,
    logger: createLogger({ level: config.logLevel }),
    concurrency: config.concurrency,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
