import {
  type TerminalOp,
  assert,
  createFakeTerminal,
  describe,
  immediateSleep,
  test,
} from "@splash-marquee/testkit";
import { MarqueeError } from "../errors.js";
import type { MarqueeLogEvent } from "../log.js";
import { guardTerminal } from "../marquee/guardTerminal.js";
import { runMarquee, setupMarquee } from "../marquee/runMarquee.js";
import { clearFrame } from "../marquee/scrollPass.js";
import { resolveRenderParams } from "../params.js";
import { createAbortError, isAbortError } from "../sleep.js";
import { createSplashImage } from "../splash.js";

const IMAGE = ["AB", "CD"] as const;
const PARAMS = { bufferPreference: 3, frameDelayMs: 5, loopDelayMs: 7 } as const;

function clearOps(width: number): TerminalOp[] {
  const blank = " ".repeat(width);
  return [
    { kind: "getCursorRow", row: 2 },
    { kind: "setCursor", column: 0, row: 0 },
    { kind: "write", text: blank },
    { kind: "setCursor", column: 0, row: 1 },
    { kind: "write", text: blank },
    { kind: "setCursor", column: 0, row: 0 },
  ];
}

describe("clearFrame", () => {
  test("blanks the frame plus two rows above it and returns to the frame's first row", async () => {
    const term = createFakeTerminal();
    await term.setCursor(0, 5);
    await clearFrame(term, 2, 3);
    assert.deepEqual(term.ops.slice(1), [
      { kind: "getCursorRow", row: 5 },
      { kind: "setCursor", column: 0, row: 1 },
      { kind: "write", text: "   " },
      { kind: "setCursor", column: 0, row: 2 },
      { kind: "write", text: "   " },
      { kind: "setCursor", column: 0, row: 3 },
      { kind: "write", text: "   " },
      { kind: "setCursor", column: 0, row: 4 },
      { kind: "write", text: "   " },
      { kind: "setCursor", column: 0, row: 3 },
    ]);
  });

  test("rows above the top of the screen are skipped", async () => {
    const term = createFakeTerminal();
    await clearFrame(term, 3, 2);
    assert.deepEqual(term.ops, [
      { kind: "getCursorRow", row: 0 },
      { kind: "setCursor", column: 0, row: 0 },
    ]);
  });
});

describe("setupMarquee", () => {
  test("resizes to the current width and image height + 2", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const setup = await setupMarquee(term, createSplashImage(IMAGE), resolveRenderParams(PARAMS));
    assert.deepEqual(term.ops, [{ kind: "setSize", width: 10, height: 4 }]);
    assert.deepEqual(setup, { hostWidth: 10, hostHeight: 4, buffer: 8 });
  });

  test("requested dimensions win and flags run before the resize", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const params = resolveRenderParams({
      ...PARAMS,
      requestedWidth: 20,
      requestedHeight: 6,
      disableInputCapture: true,
      alwaysOnTop: true,
    });
    const setup = await setupMarquee(term, createSplashImage(IMAGE), params);
    assert.deepEqual(term.ops, [
      { kind: "disableInputCapture" },
      { kind: "setAlwaysOnTop" },
      { kind: "setSize", width: 20, height: 6 },
    ]);
    assert.equal(setup.buffer, 18);
    assert.equal(term.cursorVisible(), false);
  });

  test("buffer follows the size read back after resizing", async () => {
    const term = createFakeTerminal({ width: 30, height: 24, ignoreSetSize: true });
    const params = resolveRenderParams({ ...PARAMS, requestedWidth: 10 });
    const setup = await setupMarquee(term, createSplashImage(IMAGE), params);
    assert.deepEqual(setup, { hostWidth: 30, hostHeight: 24, buffer: 28 });
  });
});

describe("runMarquee", () => {
  test("one pass renders every offset and clears between frames", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const sleeps: number[] = [];
    const result = await runMarquee(term, IMAGE, PARAMS, {
      maxPasses: 1,
      sleep: immediateSleep(sleeps),
    });

    assert.deepEqual(result, { reason: "max-passes", passes: 1, frames: 10 });
    assert.deepEqual(sleeps, [5, 5, 5, 5, 5, 5, 5, 5, 5, 5, 7]);

    const lines = term.lines();
    assert.equal(lines.length, 20);
    assert.deepEqual(lines.slice(0, 4), ["AB        ", "CD        ", "B        A", "D        C"]);
    assert.deepEqual(lines.slice(18), [" AB       ", " CD       "]);
    for (const line of lines) assert.equal(line.length, 10);

    assert.deepEqual(term.ops.slice(0, 10), [
      { kind: "setSize", width: 10, height: 4 },
      { kind: "writeLine", text: "AB        " },
      { kind: "writeLine", text: "CD        " },
      ...clearOps(10),
      { kind: "setCursorVisible", visible: false },
    ]);
    // Last frame is not cleared in-pass; the between-pass clear follows it.
    assert.deepEqual(term.ops.slice(-9), [
      { kind: "writeLine", text: " AB       " },
      { kind: "writeLine", text: " CD       " },
      { kind: "setCursorVisible", visible: false },
      ...clearOps(10),
    ]);
    assert.equal(term.ops.length, 91);
    assert.equal(term.cursorRow(), 0);
  });

  test("every pass restarts at offset 0", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const result = await runMarquee(term, IMAGE, PARAMS, {
      maxPasses: 2,
      sleep: immediateSleep(),
    });
    assert.deepEqual(result, { reason: "max-passes", passes: 2, frames: 20 });
    const lines = term.lines();
    assert.equal(lines.length, 40);
    assert.deepEqual(lines.slice(20, 22), ["AB        ", "CD        "]);
  });

  test("a resize between frames changes buffer, height and pass length", async () => {
    // getSize calls 0 and 1 belong to setup; call 2 + i is frame i.
    const term = createFakeTerminal({
      width: 10,
      height: 24,
      resizeOnRead: (call) => (call === 3 ? { width: 6, height: 1 } : undefined),
    });
    const events: MarqueeLogEvent[] = [];
    const result = await runMarquee(term, IMAGE, PARAMS, {
      maxPasses: 1,
      sleep: immediateSleep(),
      log: (event) => events.push(event),
    });

    assert.deepEqual(result, { reason: "max-passes", passes: 1, frames: 6 });
    assert.deepEqual(term.lines(), [
      "AB        ",
      "CD        ",
      "B    A",
      "    AB",
      "   AB ",
      "  AB  ",
      " AB   ",
    ]);
    const resized = events.filter((event) => event.message === "viewport resized");
    assert.deepEqual(resized, [
      { level: "info", message: "viewport resized", pass: 0, width: 6, height: 1 },
    ]);
  });

  test("logs setup and stop", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const events: MarqueeLogEvent[] = [];
    await runMarquee(term, IMAGE, PARAMS, {
      maxPasses: 1,
      sleep: immediateSleep(),
      log: (event) => events.push(event),
    });
    assert.deepEqual(events[0], {
      level: "info",
      message: "marquee ready: splash 2x2, buffer 8",
      width: 10,
      height: 4,
    });
    assert.deepEqual(events[events.length - 1], {
      level: "info",
      message: "marquee stopped (max-passes)",
      pass: 1,
    });
  });

  test("an empty image is rejected before the terminal is touched", async () => {
    const term = createFakeTerminal();
    await assert.rejects(
      runMarquee(term, [], PARAMS, { maxPasses: 1, sleep: immediateSleep() }),
      (err: unknown) => err instanceof MarqueeError && err.code === "INVALID_INPUT",
    );
    assert.equal(term.ops.length, 0);
  });

  test("invalid parameters are rejected before the terminal is touched", async () => {
    const term = createFakeTerminal();
    await assert.rejects(
      runMarquee(term, IMAGE, { loopDelayMs: 0 }, { sleep: immediateSleep() }),
      (err: unknown) => err instanceof MarqueeError && err.code === "INVALID_INPUT",
    );
    await assert.rejects(
      runMarquee(term, IMAGE, PARAMS, { maxPasses: 0, sleep: immediateSleep() }),
      (err: unknown) =>
        err instanceof MarqueeError &&
        err.message === "maxPasses must be a positive integer; got 0",
    );
    assert.equal(term.ops.length, 0);
  });

  test("an oversized buffer preference is rejected before the terminal is touched", async () => {
    const term = createFakeTerminal();
    await assert.rejects(
      runMarquee(term, ["AB"], { bufferPreference: 1e9 }, { maxPasses: 1, sleep: immediateSleep() }),
      (err: unknown) => err instanceof MarqueeError && err.code === "INVALID_INPUT",
    );
    assert.equal(term.ops.length, 0);
  });

  test("aborting during a frame delay stops the loop", async () => {
    const term = createFakeTerminal({ width: 10, height: 24 });
    const controller = new AbortController();
    let calls = 0;
    const result = await runMarquee(term, IMAGE, PARAMS, {
      signal: controller.signal,
      sleep: async (_ms, signal) => {
        calls++;
        if (calls === 3) controller.abort();
        if (signal?.aborted) throw createAbortError();
      },
    });
    assert.deepEqual(result, { reason: "aborted", passes: 0, frames: 0 });
    assert.equal(term.lines().length, 6);
    assert.deepEqual(term.ops[term.ops.length - 1], { kind: "writeLine", text: "        CD" });
  });

  test("an already aborted signal returns without touching the terminal", async () => {
    const term = createFakeTerminal();
    const controller = new AbortController();
    controller.abort();
    const result = await runMarquee(term, IMAGE, PARAMS, { signal: controller.signal });
    assert.deepEqual(result, { reason: "aborted", passes: 0, frames: 0 });
    assert.equal(term.ops.length, 0);
  });

  test("terminal failures surface as TERMINAL_UNAVAILABLE", async () => {
    const term = createFakeTerminal({ width: 10, height: 24, failOn: "writeLine" });
    const events: MarqueeLogEvent[] = [];
    await assert.rejects(
      runMarquee(term, IMAGE, PARAMS, {
        maxPasses: 1,
        sleep: immediateSleep(),
        log: (event) => events.push(event),
      }),
      (err: unknown) =>
        err instanceof MarqueeError &&
        err.code === "TERMINAL_UNAVAILABLE" &&
        err.message === "terminal writeLine failed: fake terminal: writeLine unavailable" &&
        err.cause instanceof Error,
    );
    assert.deepEqual(events[events.length - 1], {
      level: "error",
      message: "terminal writeLine failed: fake terminal: writeLine unavailable",
      pass: 0,
    });
  });
});

describe("guardTerminal", () => {
  test("wraps synchronous getSize failures", () => {
    const term = guardTerminal(createFakeTerminal({ failOn: "getSize" }));
    assert.throws(
      () => term.getSize(),
      (err: unknown) =>
        err instanceof MarqueeError &&
        err.code === "TERMINAL_UNAVAILABLE" &&
        err.message === "terminal getSize failed: fake terminal: getSize unavailable",
    );
  });

  test("passes MarqueeError through unchanged", async () => {
    const original = new MarqueeError("INVALID_INPUT", "bad");
    const base = createFakeTerminal();
    const term = guardTerminal({
      ...base,
      setSize: async () => {
        throw original;
      },
    });
    await assert.rejects(term.setSize(1, 1), (err: unknown) => err === original);
  });

  test("abort errors are recognised by name", () => {
    assert.equal(isAbortError(createAbortError()), true);
    assert.equal(isAbortError(new Error("other")), false);
    assert.equal(isAbortError("AbortError"), false);
  });
});
