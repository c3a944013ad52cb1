#!/usr/bin/env node

import { Command } from "commander";
import { collect } from "./commands/criteria.js";
import { findCommand, type FindOptions } from "./commands/find.js";
import { infoCommand, type InfoOptions } from "./commands/info.js";
import { listCommand, type ListOptions } from "./commands/list.js";
import { describeFailure } from "./commands/report.js";
import * as log from "./utils/logger.js";

const program = new Command();

program
  .name("serial-finder")
  .description("Find serial ports by USB vendor ID, product, serial number and more")
  .version("0.1.0")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      log.setVerbose(true);
    }
  });

function withCriteriaOptions(command: Command): Command {
  return command
    .option(
      "-m, --match <attribute=value>",
      "Require an attribute value, repeatable (e.g. vendorId=2341)",
      collect,
    )
    .option("-c, --criteria <file>", "Read criteria from a JSON file");
}

withCriteriaOptions(
  program.command("list").description("List attached serial ports"),
)
  .option("--json", "Print ports as JSON")
  .action(async (options: ListOptions) => {
    try {
      await listCommand(options);
    } catch (error) {
      handleError(error);
    }
  });

withCriteriaOptions(
  program
    .command("find")
    .description("Print the path of the one serial port matching the criteria"),
).action(async (options: FindOptions) => {
  try {
    await findCommand(options);
  } catch (error) {
    handleError(error);
  }
});

program
  .command("info")
  .description("Show every attribute of a serial port")
  .argument("<path>", "Serial port path (e.g. /dev/ttyACM0 or COM3)")
  .option("--json", "Print attributes as JSON")
  .action(async (path: string, options: InfoOptions) => {
    try {
      await infoCommand(path, options);
    } catch (error) {
      handleError(error);
    }
  });

function handleError(error: unknown): void {
  for (const line of describeFailure(error, log.isVerbose())) {
    log.error(line);
  }
  process.exitCode = 1;
}

process.on("uncaughtException", (error) => {
  log.error("Uncaught exception:", error.message);
  if (log.isVerbose()) {
    log.error(error.stack);
  }
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection:", String(reason));
  process.exit(1);
});

await program.parseAsync();
