import { describe, it, expect, vi } from "vitest";
import { ShutdownCoordinator } from "./shutdown-coordinator.js";
import { ShutdownError } from "../errors.js";
import { mockLogger } from "../test-support/fake-process.js";

describe("ShutdownCoordinator", () => {
  it("runs steps in reverse registration order, one at a time", async () => {
    const coordinator = new ShutdownCoordinator(mockLogger());
    const order: string[] = [];
    let active = 0;
    const step = (name: string) => async () => {
      active += 1;
      expect(active).toBe(1);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(name);
      active -= 1;
    };

    coordinator.register("lock", step("lock"));
    coordinator.register("workflow-engine", step("workflow-engine"));
    coordinator.register("sidecar", step("sidecar"));
    coordinator.register("app", step("app"));

    await expect(coordinator.shutdown()).resolves.toEqual([]);
    expect(order).toEqual(["app", "sidecar", "workflow-engine", "lock"]);
  });

  it("keeps going when a step fails", async () => {
    const logger = mockLogger();
    const coordinator = new ShutdownCoordinator(logger);
    const release = vi.fn(async () => undefined);

    coordinator.register("lock", release);
    coordinator.register("sidecar", async () => {
      throw new Error("sidecar (pid 1001) did not exit after SIGKILL");
    });

    const failures = await coordinator.shutdown();

    expect(release).toHaveBeenCalledTimes(1);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(ShutdownError);
    expect(failures[0]?.message).toBe("Failed to stop sidecar: sidecar (pid 1001) did not exit after SIGKILL");
    expect(logger.warn).toHaveBeenCalledWith(
      { step: "sidecar", error: "Failed to stop sidecar: sidecar (pid 1001) did not exit after SIGKILL" },
      "Shutdown step failed"
    );
  });

  it("runs each step once when called repeatedly", async () => {
    const coordinator = new ShutdownCoordinator(mockLogger());
    const stop = vi.fn(async () => undefined);
    coordinator.register("app", stop);

    const first = coordinator.shutdown();
    const second = coordinator.shutdown();
    await Promise.all([first, second]);
    await coordinator.shutdown();

    expect(second).toBe(first);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(coordinator.started).toBe(true);
  });

  it("runs steps registered after shutdown began", async () => {
    const coordinator = new ShutdownCoordinator(mockLogger());
    const order: string[] = [];
    coordinator.register("lock", async () => {
      order.push("lock");
    });

    const running = coordinator.shutdown();
    coordinator.register("late", async () => {
      order.push("late");
    });
    await running;
    await coordinator.shutdown();

    expect(order).toEqual(["lock", "late"]);
    expect(coordinator.pendingSteps).toEqual([]);
  });
});
