import { bold } from "picocolors";
import { Command, Option } from "commander";
import { logger } from "@tally/utils";
import cliPkg from "../package.json";
import { parseStartValue } from "./args";
import { count } from "./commands";

/**
 * Builds the `tally` command. A fresh program is returned on every call,
 * since commander keeps parsed option values on the instance.
 */
export function createProgram(): Command {
  return new Command()
    .name(bold(logger.tallyGradient("tally")))
    .description(
      "A tally counter that saves its count to a file on every change"
    )
    .usage(`${bold("<path>")} [start-value] [options]`)
    .argument(
      "<path>",
      "File the count is stored in (created if missing, overwritten on every change)"
    )
    .argument(
      "[start-value]",
      "Value to start counting from instead of the one stored in <path> (default: 0)",
      parseStartValue
    )
    .addOption(
      new Option(
        "-n, --no-sync",
        "Do not force every change to disk before accepting the next key"
      ).env("TALLY_NO_SYNC")
    )
    .version(cliPkg.version, "-v, --version", "Output the current version")
    .helpOption("-h, --help", "Display help for command")
    .action(count);
}
