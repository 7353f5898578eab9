import { expect } from "@jest/globals";
import { red } from "picocolors";
import { logger } from "@tally/utils";
import type { SpyConsole } from "./spies";

type Matcher = ReturnType<typeof expect.stringContaining>;

/**
 * Asserts the arguments of every call made to a console spy, in order, and
 * that no other calls were made.
 */
export function validateLogs(
  spy: SpyConsole[keyof SpyConsole],
  calls: Array<Array<string | Matcher>>
) {
  expect(spy).toHaveBeenCalledTimes(calls.length);
  calls.forEach((call, idx) => {
    expect(spy).toHaveBeenNthCalledWith(idx + 1, ...call);
  });
}

/**
 * Asserts that exactly these messages were reported as command failures:
 * red text behind the red `>>>` prefix.
 */
export function validateErrors(
  spy: SpyConsole["error"],
  messages: Array<string>
) {
  validateLogs(
    spy,
    messages.map((message) => [logger.prefix(logger.tallyRed), red(message)])
  );
}
