import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AppSupervisor } from "./app-supervisor.js";
import type { SourceWatcher, WatchOptions, WatchSources } from "./source-watcher.js";
import { sleep } from "../cancellation.js";
import type { OrchestratorConfig } from "../config.js";
import { AppCrashError, CancelledError } from "../errors.js";
import { HealthGate } from "../health/health-gate.js";
import { FakeHealthProbe } from "../test-support/fake-health-probe.js";
import { FakeProcessLauncher, mockLogger } from "../test-support/fake-process.js";
import { testConfig } from "../test-support/test-config.js";

class FakeWatcher {
  options: WatchOptions | null = null;
  root: string | null = null;
  readonly close = vi.fn(async () => undefined);

  readonly watch: WatchSources = (root, options): SourceWatcher => {
    this.root = root;
    this.options = options;
    return { ready: Promise.resolve(), close: this.close };
  };

  change(path: string): void {
    this.options?.onChange(path);
  }
}

describe("AppSupervisor", () => {
  let projectDir: string;
  let config: OrchestratorConfig;
  let launcher: FakeProcessLauncher;
  let probe: FakeHealthProbe;
  let watcher: FakeWatcher;
  let controller: AbortController;
  let maxAlive: number;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "appdev-app-"));
    config = testConfig(projectDir);
    launcher = new FakeProcessLauncher();
    probe = new FakeHealthProbe();
    watcher = new FakeWatcher();
    controller = new AbortController();
    maxAlive = 0;
    launcher.onLaunch("app", () => {
      maxAlive = Math.max(maxAlive, launcher.alive().length);
    });
  });

  afterEach(async () => {
    controller.abort(new CancelledError("test finished"));
    await rm(projectDir, { recursive: true, force: true });
  });

  function createSupervisor(): AppSupervisor {
    const logger = mockLogger();
    return new AppSupervisor({
      config,
      logger,
      launcher,
      healthGate: new HealthGate({ logger, probe }),
      watch: watcher.watch,
      echo: () => undefined,
    });
  }

  it("launches the app with its configured command and environment", () => {
    const app = createSupervisor();
    app.start();

    expect(launcher.latest("app")?.spec).toEqual({
      name: "app",
      command: "uv",
      args: ["run", "main.py"],
      cwd: projectDir,
      env: { APP_HTTP_PORT: "8000", DAPR_HTTP_PORT: "3500", DAPR_GRPC_PORT: "50001" },
    });
  });

  it("collapses a burst of changes into one restart", async () => {
    const app = createSupervisor();
    const running = app.run(true, controller.signal);
    expect(watcher.root).toBe(projectDir);

    for (let i = 0; i < 5; i++) {
      watcher.change(join(projectDir, "main.py"));
    }

    await vi.waitFor(() => expect(launcher.launchesOf("app")).toHaveLength(2));
    await sleep(config.app.debounceMs * 3);

    expect(app.restartCount).toBe(1);
    expect(launcher.launchesOf("app")).toHaveLength(2);
    expect(launcher.launchesOf("app")[0]?.signals).toEqual(["SIGTERM"]);
    expect(maxAlive).toBe(1);

    controller.abort(new CancelledError("SIGINT"));
    await expect(running).rejects.toBeInstanceOf(CancelledError);
  });

  it("tracks at most one pending restart while a cycle is running", async () => {
    config = { ...config, shutdown: { gracePeriodMs: 300, killTimeoutMs: 50 } };
    launcher.behave("app", { ignoreSigterm: true });
    const app = createSupervisor();
    const running = app.run(true, controller.signal);

    watcher.change(join(projectDir, "main.py"));
    await vi.waitFor(() => expect(launcher.launchesOf("app")[0]?.signals).toEqual(["SIGTERM"]));

    watcher.change(join(projectDir, "a.py"));
    await sleep(config.app.debounceMs * 2);
    watcher.change(join(projectDir, "b.py"));
    await sleep(config.app.debounceMs * 2);

    await vi.waitFor(() => expect(launcher.launchesOf("app")).toHaveLength(3), { timeout: 2_000 });
    await sleep(100);

    expect(launcher.launchesOf("app")).toHaveLength(3);
    expect(app.restartCount).toBe(2);
    expect(maxAlive).toBe(1);

    controller.abort(new CancelledError("SIGINT"));
    await expect(running).rejects.toBeInstanceOf(CancelledError);
  });

  it("ends with AppCrashError when the app exits on its own", async () => {
    launcher.onLaunch("app", (child) => {
      queueMicrotask(() => {
        child.write("Traceback (most recent call last):\n", "stderr");
        child.write("ImportError: no module named app\n", "stderr");
        child.exitWith(1);
      });
    });
    const app = createSupervisor();

    const error = await app.run(true, controller.signal).then(
      () => null,
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(AppCrashError);
    expect(error).toMatchObject({
      appExitCode: 1,
      logTail: ["Traceback (most recent call last):", "ImportError: no module named app"],
    });
    expect(watcher.close).toHaveBeenCalledTimes(1);
  });

  it("resolves when the app exits cleanly", async () => {
    launcher.onLaunch("app", (child) => {
      queueMicrotask(() => child.exitWith(0));
    });
    const app = createSupervisor();

    await expect(app.run(false, controller.signal)).resolves.toEqual({ code: 0, signal: null });
    expect(watcher.options).toBeNull();
  });

  it("does not watch when hot reload is off", async () => {
    const app = createSupervisor();
    const running = app.run(false, controller.signal);

    expect(watcher.options).toBeNull();
    controller.abort(new CancelledError("SIGTERM"));

    await expect(running).rejects.toMatchObject({ reason: "SIGTERM" });
    expect(app.process.isAlive).toBe(true);
    await app.stop();
  });

  it("resolves when stopped from outside", async () => {
    const app = createSupervisor();
    const running = app.run(false, controller.signal);

    await app.stop();

    await expect(running).resolves.toEqual({ code: null, signal: "SIGTERM" });
  });

  it("closes the watcher and drops pending changes on cancellation", async () => {
    const app = createSupervisor();
    const running = app.run(true, controller.signal);

    watcher.change(join(projectDir, "main.py"));
    controller.abort(new CancelledError("SIGINT"));

    await expect(running).rejects.toBeInstanceOf(CancelledError);
    await sleep(config.app.debounceMs * 2);
    expect(watcher.close).toHaveBeenCalledTimes(1);
    expect(launcher.launchesOf("app")).toHaveLength(1);
  });

  describe("awaitHealthy", () => {
    it("marks the app healthy once its endpoint answers", async () => {
      probe.healthy(config.app.healthUrl);
      const app = createSupervisor();
      app.start();

      const result = await app.awaitHealthy();

      expect(result.success).toBe(true);
      expect(app.process.status).toBe("healthy");
    });

    it("gives up as soon as the app exits", async () => {
      launcher.onLaunch("app", (child) => {
        queueMicrotask(() => child.exitWith(3));
      });
      const app = createSupervisor();
      app.start();

      const result = await app.awaitHealthy();

      expect(result.success).toBe(false);
      expect(result.error).toBe("app exited with code 3");
    });
  });
});
