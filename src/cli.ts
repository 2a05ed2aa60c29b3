#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { addCommands } from "./command_line/commands";
import { err } from "./command_line/format";

addCommands(yargs(hideBin(process.argv)))
  .scriptName("abi-coder")
  .demandCommand(1)
  .strict()
  .help("h")
  .alias("h", "help")
  .fail(function (msg, error) {
    if (msg) {
      console.error(msg);
    }
    if (error?.message) {
      console.error(err(error.message));
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? err(error.message) : error);
    process.exitCode = 1;
  });
