import fs from "fs-extra";
import {
  INT64_MAX,
  INT64_MIN,
  checkedAdd,
  checkedSub,
  parseInt64,
} from "./int64";
import { TallyError, ioError } from "./errors";

// read/write, create if missing, never truncate on open
const OPEN_FLAGS = fs.constants.O_RDWR | fs.constants.O_CREAT;

export interface FileCounterOptions {
  // file the count is stored in
  path: string;
  // explicit starting value, overrides anything already in the file
  value?: bigint;
  // fdatasync after every write
  sync: boolean;
  // asked when the file holds something that isn't a count
  confirmInvalidContent: () => Promise<boolean>;
}

export type StepResult =
  | { status: "ok"; value: bigint }
  | { status: "overflow" | "underflow"; value: bigint };

type LoadedContent =
  | { kind: "empty" }
  | { kind: "value"; value: bigint }
  | { kind: "invalid"; line: string };

export function parseCounterContent(content: string): LoadedContent {
  if (content === "") {
    return { kind: "empty" };
  }
  const [firstLine = ""] = content.split("\n", 1);
  const line = firstLine.trimEnd();
  const value = parseInt64(line);
  if (value === undefined) {
    return { kind: "invalid", line };
  }
  return { kind: "value", value };
}

export function formatCounterContent(value: bigint): string {
  return value.toString(10);
}

/**
 * A counter backed by a single text file holding its decimal value.
 *
 * The file descriptor stays open for the life of the counter. Every
 * successful change rewrites the whole file, so after `increment`,
 * `decrement` or `persist` return the file holds exactly `value`.
 */
export class FileCounter {
  readonly path: string;
  readonly sync: boolean;
  // true when non-counter content was accepted for overwriting
  readonly recovered: boolean;
  private count: bigint;
  private fd: number | undefined;

  private constructor({
    path,
    fd,
    value,
    sync,
    recovered,
  }: {
    path: string;
    fd: number;
    value: bigint;
    sync: boolean;
    recovered: boolean;
  }) {
    this.path = path;
    this.fd = fd;
    this.count = value;
    this.sync = sync;
    this.recovered = recovered;
  }

  static async open({
    path,
    value,
    sync,
    confirmInvalidContent,
  }: FileCounterOptions): Promise<FileCounter> {
    if (value !== undefined && (value < INT64_MIN || value > INT64_MAX)) {
      throw new TallyError(`Start value ${value} is out of range`, {
        type: "invalid_data",
      });
    }

    let fd: number;
    try {
      fd = fs.openSync(path, OPEN_FLAGS);
    } catch (err) {
      throw ioError(err);
    }

    try {
      let initial = value ?? 0n;
      let recovered = false;

      if (value === undefined) {
        const loaded = parseCounterContent(readAll(fd));
        if (loaded.kind === "value") {
          initial = loaded.value;
        } else if (loaded.kind === "invalid") {
          if (!(await confirmInvalidContent())) {
            throw new TallyError("File contained non-counter data", {
              type: "invalid_data",
            });
          }
          recovered = true;
        }
      }

      const counter = new FileCounter({
        path,
        fd,
        value: initial,
        sync,
        recovered,
      });
      counter.persist();
      return counter;
    } catch (err) {
      fs.closeSync(fd);
      throw err;
    }
  }

  get value(): bigint {
    return this.count;
  }

  increment(): StepResult {
    const next = checkedAdd(this.count, 1n);
    if (next === undefined) {
      return { status: "overflow", value: this.count };
    }
    this.write(next);
    this.count = next;
    return { status: "ok", value: next };
  }

  decrement(): StepResult {
    const next = checkedSub(this.count, 1n);
    if (next === undefined) {
      return { status: "underflow", value: this.count };
    }
    this.write(next);
    this.count = next;
    return { status: "ok", value: next };
  }

  /**
   * Replaces the file content with the current value: truncate, write from
   * offset 0, then fdatasync when `sync` is on.
   */
  persist() {
    this.write(this.count);
  }

  close() {
    if (this.fd === undefined) {
      return;
    }
    const fd = this.fd;
    this.fd = undefined;
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw ioError(err);
    }
  }

  private write(value: bigint) {
    const fd = this.descriptor();
    const data = Buffer.from(formatCounterContent(value), "utf8");
    try {
      fs.ftruncateSync(fd, 0);
      let written = 0;
      while (written < data.length) {
        written += fs.writeSync(
          fd,
          data,
          written,
          data.length - written,
          written
        );
      }
      if (this.sync) {
        fs.fdatasyncSync(fd);
      }
    } catch (err) {
      throw ioError(err);
    }
  }

  private descriptor(): number {
    if (this.fd === undefined) {
      throw new TallyError(`${this.path} is already closed`, {
        type: "io_error",
      });
    }
    return this.fd;
  }
}

function readAll(fd: number): string {
  try {
    return fs.readFileSync(fd, "utf8");
  } catch (err) {
    throw ioError(err);
  }
}
