import { reset, bold as pcBold, dim } from "picocolors";
import gradient from "gradient-string";

const BLUE = "#0099F7";
const RED = "#F11712";
const YELLOW = "#FFFF00";

const hex = (color: string): ((text: string) => string) => {
  const ansiColor = hexToAnsi256(color);
  return (text: string) => `\x1b[38;5;${ansiColor}m${text}${reset("")}`;
};

export const tallyGradient = gradient(BLUE, RED);
export const tallyBlue = hex(BLUE);
export const tallyRed = hex(RED);
export const yellow = hex(YELLOW);

// the ">>>" marker every logged line and prompt starts with
export const prefix = (color: (text: string) => string) =>
  color(pcBold(">>>"));

export const dimmed = (...args: Array<string>) => {
  log(dim(args.join(" ")));
};

export const log = (...args: Array<unknown>) => {
  // eslint-disable-next-line no-console -- logger
  console.log(...args);
};

export const error = (...args: Array<unknown>) => {
  // eslint-disable-next-line no-console -- error logger
  console.error(prefix(tallyRed), args.join(" "));
};

function hexToAnsi256(sHex: string): number {
  const rgb = parseInt(sHex.slice(1), 16);
  const r = Math.floor(rgb / (256 * 256)) % 256;
  const g = Math.floor(rgb / 256) % 256;
  const b = rgb % 256;

  const ansi =
    16 +
    36 * Math.round((r / 255) * 5) +
    6 * Math.round((g / 255) * 5) +
    Math.round((b / 255) * 5);
  return ansi;
}
