import os from "node:os";
import readline, { type Key } from "node:readline";
import { TallyError } from "./errors";

const ESC = "\x1b";
const CSI = `${ESC}[`;

export const ansi = {
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  clearLine: `${CSI}2K`,
} as const;

const RESTORE_SIGNALS = ["SIGINT", "SIGQUIT", "SIGTERM", "SIGHUP"] as const;

export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

export interface TerminalOptions {
  input?: TerminalInput;
  output?: NodeJS.WritableStream;
}

type PendingRead = {
  resolve: (key: Key) => void;
  reject: (err: Error) => void;
};

/**
 * Owns the process-wide terminal state: raw mode, cursor visibility and the
 * stream of decoded key presses.
 *
 * Key presses are queued as soon as they are decoded, so keys typed while
 * no one is reading (e.g. between two prompts) are delivered in order to
 * the next `readKey`.
 */
export class Terminal {
  readonly input: TerminalInput;
  readonly output: NodeJS.WritableStream;
  private queue: Array<Key> = [];
  private pending: PendingRead | undefined;
  private ended = false;
  private listening = false;
  private active: TerminalSession | undefined;

  constructor({
    input = process.stdin,
    output = process.stdout,
  }: TerminalOptions = {}) {
    this.input = input;
    this.output = output;
  }

  get isInteractive(): boolean {
    return (
      Boolean(this.input.isTTY) && typeof this.input.setRawMode === "function"
    );
  }

  /**
   * Runs `task` with the terminal in raw mode and the cursor hidden. The
   * previous state is restored however the task finishes, and also if the
   * process exits or receives SIGINT, SIGQUIT, SIGTERM or SIGHUP while the
   * task is running.
   */
  async withSession<T>(
    task: (session: TerminalSession) => Promise<T>
  ): Promise<T> {
    if (!this.isInteractive) {
      throw new TallyError("tally needs an interactive terminal", {
        type: "not_a_terminal",
      });
    }
    if (this.active) {
      throw new TallyError("A terminal session is already active");
    }

    this.listen();
    const session = new TerminalSession(this);
    this.active = session;

    const onExit = () => {
      session.restore();
    };
    const onSignal = (signal: NodeJS.Signals) => {
      session.restore();
      process.exit(128 + os.constants.signals[signal]);
    };

    process.once("exit", onExit);
    for (const signal of RESTORE_SIGNALS) {
      process.on(signal, onSignal);
    }

    try {
      session.start();
      return await task(session);
    } finally {
      session.restore();
      process.off("exit", onExit);
      for (const signal of RESTORE_SIGNALS) {
        process.off(signal, onSignal);
      }
      this.active = undefined;
    }
  }

  setRawMode(mode: boolean) {
    this.input.setRawMode?.(mode);
  }

  write(text: string) {
    this.output.write(text);
  }

  readKey(): Promise<Key> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.ended) {
      return Promise.reject(closedError());
    }
    if (this.pending) {
      return Promise.reject(new TallyError("A key read is already pending"));
    }
    return new Promise<Key>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  private listen() {
    if (this.listening) {
      return;
    }
    this.listening = true;
    readline.emitKeypressEvents(this.input);
    this.input.on("keypress", this.onKeypress);
    this.input.once("end", this.onEnd);
  }

  private onKeypress = (_str: string | undefined, key: Key | undefined) => {
    if (!key) {
      return;
    }
    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.resolve(key);
    } else {
      this.queue.push(key);
    }
  };

  private onEnd = () => {
    this.ended = true;
    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.reject(closedError());
    }
  };
}

export class TerminalSession {
  private restored = false;

  constructor(private readonly terminal: Terminal) {}

  start() {
    this.terminal.setRawMode(true);
    this.terminal.write(ansi.hideCursor);
    this.terminal.input.resume();
  }

  /**
   * Draws `prompt` over whatever is on the current line.
   */
  render(prompt: string) {
    this.terminal.write(`\r${ansi.clearLine}${prompt}`);
  }

  readKey(): Promise<Key> {
    return this.terminal.readKey();
  }

  /**
   * Prints a line of its own below the prompt, outside raw mode so the
   * line ending is translated as usual.
   */
  notice(message: string) {
    this.terminal.setRawMode(false);
    this.terminal.write(`\n${message}\n`);
    this.terminal.setRawMode(true);
  }

  restore() {
    if (this.restored) {
      return;
    }
    this.restored = true;
    this.terminal.input.pause();
    this.terminal.write(ansi.showCursor);
    this.terminal.setRawMode(false);
    this.terminal.write("\n");
  }
}

function closedError(): TallyError {
  return new TallyError("Input stream closed", { type: "io_error" });
}
