export type TallyErrorType =
  // filesystem and terminal input
  | "io_error"
  // counter file
  | "invalid_data"
  // environment
  | "not_a_terminal"
  // user chose to quit from a prompt
  | "aborted"
  // default
  | "unknown";

export type TallyErrorOptions = {
  type?: TallyErrorType;
  cause?: unknown;
};

export class TallyError extends Error {
  public type: TallyErrorType;

  constructor(message: string, opts?: TallyErrorOptions) {
    super(message, { cause: opts?.cause });
    this.name = "TallyError";
    this.type = opts?.type ?? "unknown";
    Error.captureStackTrace(this, TallyError);
  }
}

/**
 * Wraps a failed filesystem call, keeping the system message
 * (e.g. "EISDIR: illegal operation on a directory, open '/tmp'").
 */
export function ioError(err: unknown): TallyError {
  const message = err instanceof Error ? err.message : String(err);
  return new TallyError(message, { type: "io_error", cause: err });
}
