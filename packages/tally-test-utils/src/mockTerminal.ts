import { PassThrough, Writable } from "node:stream";
import { jest } from "@jest/globals";

export const keys = {
  space: " ",
  backspace: "\x7f",
  enter: "\r",
  up: "\x1b[A",
  ctrlC: "\x03",
} as const;

/**
 * A stdin stand-in that reports itself as a TTY and records raw mode changes.
 */
export class MockInput extends PassThrough {
  isTTY = true;
  isRaw = false;
  setRawMode = jest.fn((mode: boolean) => {
    this.isRaw = mode;
    return this;
  });

  /**
   * Types the given key sequences. Each string is written as its own chunk,
   * the way a terminal delivers separate key presses.
   */
  press(...sequences: Array<string>) {
    for (const sequence of sequences) {
      this.write(sequence);
    }
  }
}

export class MockOutput extends Writable {
  chunks: Array<string> = [];

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ) {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }

  clear() {
    this.chunks = [];
  }
}

export function mockTerminal() {
  return { input: new MockInput(), output: new MockOutput() };
}

export type MockTerminal = ReturnType<typeof mockTerminal>;
