import type { Terminal } from "../../terminal";

export type CountCommandArgument = string;

export type StartValueArgument = bigint | undefined;

export type CounterChoice = "increment" | "decrement" | "quit";

export type OverwriteChoice = "yes" | "no" | "quit";

export interface CountCommandOptions {
  // fdatasync after every change (--no-sync turns it off)
  sync: boolean;
  // defaults to stdin/stdout
  terminal?: Terminal;
}
