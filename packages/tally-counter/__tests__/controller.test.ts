import path from "node:path";
import { describe, it, expect, jest } from "@jest/globals";
import { bold } from "picocolors";
import { logger } from "@tally/utils";
import { keys, mockTerminal, setupTestFixtures } from "@tally/test-utils";
import { FileCounter } from "../src/store";
import { Terminal, ansi } from "../src/terminal";
import { runCounter, transition } from "../src/commands/count/controller";
import { counterPrompt } from "../src/commands/count/prompts";

const render = (...values: Array<bigint>) =>
  values.map((value) => `\r${ansi.clearLine}${counterPrompt(value)}`).join("");

describe("runCounter()", () => {
  const { useFixture } = setupTestFixtures({
    directory: path.join(__dirname, "../"),
    test: "count",
  });

  const openCounter = (file: string) =>
    FileCounter.open({
      path: file,
      sync: true,
      confirmInvalidContent: () => Promise.resolve(false),
    });

  it("increments and decrements with every bound key", async () => {
    const { path: filePath, read } = useFixture({ fixture: "counter" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();

    input.press("+", "=", keys.space, "-", "_", keys.backspace, "+", "q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(counter.value).toBe(43n);
    expect(read("counter.txt")).toBe("43");
    expect(output.text).toBe(
      `${ansi.hideCursor}${render(42n, 43n, 44n, 45n, 44n, 43n, 42n, 43n)}${
        ansi.showCursor
      }\n`
    );
    expect(input.isRaw).toBe(false);
    counter.close();
  });

  it("leaves the file at the initial value when quitting right away", async () => {
    const { path: filePath, read } = useFixture({ fixture: "counter-newline" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();

    input.press("Q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(read("counter.txt")).toBe("42");
    expect(output.text).toBe(
      `${ansi.hideCursor}${render(42n)}${ansi.showCursor}\n`
    );
    counter.close();
  });

  it("quits on ctrl+c", async () => {
    const { path: filePath, read } = useFixture({ fixture: "counter" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();

    input.press("+", keys.ctrlC);
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(read("counter.txt")).toBe("43");
    counter.close();
  });

  it("ignores keys that are not bound", async () => {
    const { path: filePath, read } = useFixture({ fixture: "counter" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();

    input.press("x", keys.enter, "q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(read("counter.txt")).toBe("42");
    expect(output.text).toBe(
      `${ansi.hideCursor}${render(42n, 42n, 42n)}${ansi.showCursor}\n`
    );
    counter.close();
  });

  it("goes below zero", async () => {
    const { path: filePath, read } = useFixture({ fixture: "counter" });
    const counter = await FileCounter.open({
      path: filePath("counter.txt"),
      value: 0n,
      sync: true,
      confirmInvalidContent: () => Promise.resolve(false),
    });
    const { input, output } = mockTerminal();

    input.press("-", "-", "q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(read("counter.txt")).toBe("-2");
    counter.close();
  });

  it("prints a notice and keeps the value on overflow", async () => {
    const { path: filePath, read } = useFixture({ fixture: "int64-max" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();
    const notice = `\n${logger.prefix(logger.yellow)} ${bold("overflow!")}\n`;

    input.press("+", "q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(read("counter.txt")).toBe("9223372036854775807");
    expect(output.text).toBe(
      `${ansi.hideCursor}${render(counter.value)}${notice}${render(
        counter.value
      )}${ansi.showCursor}\n`
    );
    // left raw mode for the notice, then came back
    expect(input.setRawMode.mock.calls).toEqual([
      [true],
      [false],
      [true],
      [false],
    ]);
    counter.close();
  });

  it("prints a notice and keeps the value on underflow", async () => {
    const { path: filePath, read } = useFixture({ fixture: "int64-min" });
    const counter = await openCounter(filePath("counter.txt"));
    const { input, output } = mockTerminal();

    input.press("-", "+", "q");
    await runCounter({ counter, terminal: new Terminal({ input, output }) });

    expect(output.text).toContain(
      `\n${logger.prefix(logger.yellow)} ${bold("underflow!")}\n`
    );
    expect(read("counter.txt")).toBe("-9223372036854775807");
    counter.close();
  });
});

describe("transition()", () => {
  const { useFixture } = setupTestFixtures({
    directory: path.join(__dirname, "../"),
    test: "count",
  });

  it("moves to quitting without touching the counter", async () => {
    const { path: filePath } = useFixture({ fixture: "counter" });
    const counter = await FileCounter.open({
      path: filePath("counter.txt"),
      sync: true,
      confirmInvalidContent: () => Promise.resolve(false),
    });
    const increment = jest.spyOn(counter, "increment");
    const decrement = jest.spyOn(counter, "decrement");
    const { input, output } = mockTerminal();

    await new Terminal({ input, output }).withSession(async (session) => {
      expect(transition(counter, "quit", session)).toBe("quitting");
      expect(transition(counter, "increment", session)).toBe("running");
    });

    expect(increment).toHaveBeenCalledTimes(1);
    expect(decrement).not.toHaveBeenCalled();
    expect(counter.value).toBe(43n);
    counter.close();
  });
});
