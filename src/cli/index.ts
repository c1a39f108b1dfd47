#!/usr/bin/env node

/**
 * typeweave CLI - JSON decoders and encoders for Gleam custom types
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "typeweave",
  version: "0.1.0",
  description: "Generate JSON decoders and encoders for annotated Gleam custom types",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", "info")
    .hook("preAction", (command) => {
      const level: unknown = command.opts()["logLevel"];
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      } else {
        logger.warn(`Unknown log level ${String(level)}, keeping ${logger.getLevel()}`);
      }
    });

  program.addCommand(createGenerateCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify({ status: "error", error: { code: "UNEXPECTED_ERROR", message } }, null, 2),
  );
  process.exit(1);
});
