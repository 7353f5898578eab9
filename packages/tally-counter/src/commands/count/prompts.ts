import { bold, dim } from "picocolors";
import { logger } from "@tally/utils";
import { createKeyMap, getChoice } from "../../keys";
import type { Terminal } from "../../terminal";
import { TallyError } from "../../errors";
import type { CounterChoice, OverwriteChoice } from "./types";

export const OVERWRITE_PROMPT =
  "File contains non-counter data. Use anyway? (data will be lost!)  [y/n]";

export const overwriteKeys = createKeyMap<OverwriteChoice>([
  ["yes", ["y", "Y"]],
  ["no", ["n", "N"]],
  ["quit", ["q", "Q", "ctrl+c"]],
]);

export const counterKeys = createKeyMap<CounterChoice>([
  // "=" is "+" without shift
  ["increment", ["+", "=", "space"]],
  // "_" is "-" with shift
  ["decrement", ["-", "_", "backspace"]],
  ["quit", ["q", "Q", "ctrl+c"]],
]);

export function counterPrompt(value: bigint): string {
  return `${logger.prefix(logger.tallyBlue)} Count: ${bold(
    value.toString()
  )}  ${dim("[+/-/q]")}`;
}

/**
 * Asks whether a file that doesn't hold a count may be overwritten.
 * Choosing "quit" restores the terminal and then fails with an `aborted`
 * error, which the command turns into exit status 1.
 */
export async function confirmOverwrite(terminal: Terminal): Promise<boolean> {
  const choice = await terminal.withSession((session) =>
    getChoice(session, OVERWRITE_PROMPT, overwriteKeys)
  );
  if (choice === "quit") {
    throw new TallyError("Aborted", { type: "aborted" });
  }
  return choice === "yes";
}
