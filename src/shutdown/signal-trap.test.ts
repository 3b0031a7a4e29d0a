import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import { SignalTrap } from "./signal-trap.js";
import { CancelledError } from "../errors.js";
import { mockLogger } from "../test-support/fake-process.js";

describe("SignalTrap", () => {
  it("aborts the controller once on the first signal", () => {
    const emitter = new EventEmitter();
    const controller = new AbortController();
    const logger = mockLogger();
    const trap = new SignalTrap({ controller, logger, emitter });
    trap.install();

    emitter.emit("SIGINT");
    const reason: unknown = controller.signal.reason;
    emitter.emit("SIGTERM");

    expect(controller.signal.aborted).toBe(true);
    expect(reason).toBeInstanceOf(CancelledError);
    expect(controller.signal.reason).toBe(reason);
    expect(trap.received).toBe("SIGINT");
    expect(logger.warn).toHaveBeenLastCalledWith({ signal: "SIGTERM" }, "Already shutting down, ignoring signal");
  });

  it("removes its listeners on dispose", () => {
    const emitter = new EventEmitter();
    const trap = new SignalTrap({ controller: new AbortController(), logger: mockLogger(), emitter });

    trap.install();
    trap.install();
    expect(emitter.listenerCount("SIGINT")).toBe(1);

    trap.dispose();
    expect(emitter.listenerCount("SIGINT")).toBe(0);
    expect(emitter.listenerCount("SIGTERM")).toBe(0);
  });
});
