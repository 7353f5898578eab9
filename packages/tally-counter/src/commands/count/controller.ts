import { bold } from "picocolors";
import { logger } from "@tally/utils";
import { getChoice } from "../../keys";
import type { FileCounter, StepResult } from "../../store";
import type { Terminal, TerminalSession } from "../../terminal";
import { counterKeys, counterPrompt } from "./prompts";
import type { CounterChoice } from "./types";

export type CounterState = "running" | "quitting";

const NOTICES: Record<Exclude<StepResult["status"], "ok">, string> = {
  overflow: "overflow!",
  underflow: "underflow!",
};

/**
 * Applies one choice to the counter and returns the next state. A step past
 * the 64-bit range leaves the value (and the file) as they were and prints
 * a notice instead.
 */
export function transition(
  counter: FileCounter,
  choice: CounterChoice,
  session: TerminalSession
): CounterState {
  if (choice === "quit") {
    return "quitting";
  }

  const result =
    choice === "increment" ? counter.increment() : counter.decrement();
  if (result.status !== "ok") {
    session.notice(
      `${logger.prefix(logger.yellow)} ${bold(NOTICES[result.status])}`
    );
  }
  return "running";
}

export async function runCounter({
  counter,
  terminal,
}: {
  counter: FileCounter;
  terminal: Terminal;
}): Promise<void> {
  await terminal.withSession(async (session) => {
    let state: CounterState = "running";
    while (state === "running") {
      const choice = await getChoice(
        session,
        counterPrompt(counter.value),
        counterKeys
      );
      state = transition(counter, choice, session);
    }
  });
}
