import { afterAll, afterEach, beforeEach, jest } from "@jest/globals";
import type { MockInstance } from "jest-mock";

export interface SpyConsole {
  log: MockInstance<Console["log"]> | undefined;
  error: MockInstance<Console["error"]> | undefined;
}

export interface SpyExit {
  exit: MockInstance<typeof process.exit> | undefined;
}

interface Spy {
  mockClear: () => unknown;
  mockRestore: () => unknown;
}

// fresh spies for every test, restored once the suite is done
function installEach(install: () => Array<Spy>) {
  let spies: Array<Spy> = [];

  beforeEach(() => {
    spies = install();
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockClear());
  });

  afterAll(() => {
    spies.forEach((spy) => spy.mockRestore());
  });
}

const silence = () => {
  // keep test output clean
};

/**
 * Silences `console.log` and `console.error`, which is where the tally
 * logger writes.
 */
export function spyConsole(): SpyConsole {
  const spy: SpyConsole = { log: undefined, error: undefined };

  installEach(() => {
    spy.log = jest.spyOn(console, "log").mockImplementation(silence);
    spy.error = jest.spyOn(console, "error").mockImplementation(silence);
    return [spy.log, spy.error];
  });

  return spy;
}

/**
 * Replaces `process.exit` with a no-op so exit codes can be asserted.
 */
export function spyExit(): SpyExit {
  const spy: SpyExit = { exit: undefined };

  installEach(() => {
    spy.exit = jest
      .spyOn(process, "exit")
      .mockImplementation(() => undefined as never);
    return [spy.exit];
  });

  return spy;
}
