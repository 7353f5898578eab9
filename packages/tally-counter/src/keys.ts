import type { Key } from "node:readline";
import type { TerminalSession } from "./terminal";

/**
 * Maps key names (see `keyName`) to the logical choice they stand for.
 */
export type KeyMap<T> = ReadonlyMap<string, T>;

export type KeyBindings<T> = ReadonlyArray<
  readonly [choice: T, keys: ReadonlyArray<string>]
>;

const DELETE = "\x7f";

/**
 * Names a decoded key press the way key maps refer to it:
 *
 * - `ctrl+c`, `meta+x` for modified keys
 * - the character itself for printable characters (`+`, `q`, `Q`)
 * - the readline name otherwise (`space`, `backspace`, `return`, `up`)
 */
export function keyName({
  sequence,
  name,
  ctrl,
  meta,
}: Key): string | undefined {
  if (ctrl && name) {
    return `ctrl+${name}`;
  }
  if (meta && name) {
    return `meta+${name}`;
  }
  if (
    sequence !== undefined &&
    [...sequence].length === 1 &&
    sequence > " " &&
    sequence !== DELETE
  ) {
    return sequence;
  }
  return name;
}

export function createKeyMap<T>(bindings: KeyBindings<T>): KeyMap<T> {
  const map = new Map<string, T>();
  for (const [choice, keys] of bindings) {
    for (const key of keys) {
      if (map.has(key)) {
        throw new Error(`Key "${key}" is bound more than once`);
      }
      map.set(key, choice);
    }
  }
  return map;
}

/**
 * Shows `prompt` and waits until a key in `keyMap` is pressed, resolving
 * with its choice. Any other key redraws the prompt and keeps waiting.
 */
export async function getChoice<T>(
  session: TerminalSession,
  prompt: string,
  keyMap: KeyMap<T>
): Promise<T> {
  for (;;) {
    session.render(prompt);
    const name = keyName(await session.readKey());
    if (name !== undefined) {
      const choice = keyMap.get(name);
      if (choice !== undefined) {
        return choice;
      }
    }
  }
}
