import { describe, it, expect } from "vitest";
import { CancelledError } from "./errors.js";
import { cancelledFrom, linkedController, raceCancellation, sleep, throwIfCancelled } from "./cancellation.js";

describe("sleep", () => {
  it("resolves after the delay", async () => {
    const started = Date.now();
    await sleep(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it("rejects promptly when the signal fires", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(5_000, controller.signal);
    controller.abort(new CancelledError("SIGINT"));

    await expect(pending).rejects.toMatchObject({ kind: "cancelled", reason: "SIGINT" });
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("rejects immediately for an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort("stop");
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("cancelledFrom", () => {
  it("reuses a CancelledError reason", () => {
    const controller = new AbortController();
    const reason = new CancelledError("SIGTERM");
    controller.abort(reason);
    expect(cancelledFrom(controller.signal)).toBe(reason);
  });

  it("wraps string reasons", () => {
    const controller = new AbortController();
    controller.abort("user quit");
    expect(cancelledFrom(controller.signal).reason).toBe("user quit");
  });
});

describe("throwIfCancelled", () => {
  it("does nothing without a signal", () => {
    expect(() => throwIfCancelled()).not.toThrow();
  });

  it("throws once aborted", () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
  });
});

describe("raceCancellation", () => {
  it("passes the value through", async () => {
    const controller = new AbortController();
    await expect(raceCancellation(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it("rejects when aborted before the promise settles", async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);
    const raced = raceCancellation(never, controller.signal);
    controller.abort();
    await expect(raced).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("linkedController", () => {
  it("follows the parent", () => {
    const parent = new AbortController();
    const { controller } = linkedController(parent.signal);
    parent.abort("bye");
    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBe("bye");
  });

  it("can abort without touching the parent", () => {
    const parent = new AbortController();
    const { controller, dispose } = linkedController(parent.signal);
    controller.abort();
    dispose();
    expect(parent.signal.aborted).toBe(false);
  });
});
