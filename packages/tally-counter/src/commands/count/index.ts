import { red } from "picocolors";
import { logger } from "@tally/utils";
import { FileCounter } from "../../store";
import { Terminal } from "../../terminal";
import { TallyError } from "../../errors";
import { runCounter } from "./controller";
import * as prompts from "./prompts";
import type {
  CountCommandArgument,
  CountCommandOptions,
  StartValueArgument,
} from "./types";

const { dimmed, error } = logger;

function handleErrors(err: unknown) {
  // the recovery prompt was quit, nothing left to report
  if (err instanceof TallyError && err.type === "aborted") {
    process.exit(1);
  } else if (err instanceof TallyError) {
    error(red(err.message));
    process.exit(1);
  }

  // anything else is reported by the CLI root
  else {
    throw err;
  }
}

export async function count(
  path: CountCommandArgument,
  startValue: StartValueArgument,
  opts: CountCommandOptions
) {
  const terminal = opts.terminal ?? new Terminal();

  let counter: FileCounter;
  try {
    if (!terminal.isInteractive) {
      throw new TallyError("tally needs an interactive terminal", {
        type: "not_a_terminal",
      });
    }
    counter = await FileCounter.open({
      path,
      value: startValue,
      sync: opts.sync,
      confirmInvalidContent: () => prompts.confirmOverwrite(terminal),
    });
  } catch (err) {
    handleErrors(err);
    return;
  }

  if (counter.recovered) {
    dimmed(`Replaced non-counter data in ${path}`);
  }

  try {
    await runCounter({ counter, terminal });
  } catch (err) {
    handleErrors(err);
  } finally {
    counter.close();
  }
}
