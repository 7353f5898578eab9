export { setupTestFixtures } from "./useFixtures";
export { validateLogs, validateErrors } from "./validateLogs";

export { spyConsole, spyExit } from "./spies";
export type { SpyConsole, SpyExit } from "./spies";

export { mockTerminal, keys, MockInput, MockOutput } from "./mockTerminal";
export type { MockTerminal } from "./mockTerminal";
