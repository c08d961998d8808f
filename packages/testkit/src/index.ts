export { assert, describe, immediateSleep, test } from "./nodeTest.js";
export {
  type FakeTerminal,
  type FakeTerminalOptions,
  type TerminalOp,
  type TerminalOpKind,
  createFakeTerminal,
} from "./fakeTerminal.js";
export { type ScreenSnapshot, type ScreenTerminal, createScreenTerminal } from "./screenTerminal.js";
