import { InvalidArgumentError } from "commander";
import { INT64_MAX, INT64_MIN, parseInt64 } from "./int64";

/**
 * commander argument parser for `[start-value]`.
 */
export function parseStartValue(value: string): bigint {
  const parsed = parseInt64(value.trim());
  if (parsed === undefined) {
    throw new InvalidArgumentError(
      `Expected an integer between ${INT64_MIN} and ${INT64_MAX}.`
    );
  }
  return parsed;
}
