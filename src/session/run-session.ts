import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { AppSupervisor } from "../app/app-supervisor.js";
import type { WatchSources } from "../app/source-watcher.js";
import type { OrchestratorConfig } from "../config.js";
import { DependencySupervisor } from "../dependencies/dependency-supervisor.js";
import type { SidecarReset } from "../dependencies/types.js";
import { AppCrashError, HealthTimeoutError, ShutdownError } from "../errors.js";
import { HealthGate } from "../health/health-gate.js";
import type { HealthProbe } from "../health/types.js";
import type { Logger } from "../logger.js";
import { NodeProcessLauncher } from "../process/node-launcher.js";
import type { ChildExit, OutputEcho, ProcessLauncher } from "../process/types.js";
import { ShutdownCoordinator } from "../shutdown/shutdown-coordinator.js";
import type { E2eStack } from "../testing/types.js";
import { LOCK_FILE, ProjectLock } from "./project-lock.js";
import type { SessionMode } from "./types.js";

export interface RunSessionDeps {
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly mode: SessionMode;
  readonly hotReload: boolean;
  readonly launcher?: ProcessLauncher;
  readonly probe?: HealthProbe;
  readonly watch?: WatchSources;
  readonly echo?: OutputEcho;
  readonly sidecarReset?: SidecarReset;
  readonly isProcessAlive?: (pid: number) => boolean;
}

/**
 * One `run` or `test` invocation against one project. Everything the session
 * starts is registered with its shutdown coordinator as it starts, so close()
 * stops it all in reverse order whatever path the session ends on.
 */
export class RunSession implements E2eStack {
  readonly id = randomUUID();
  readonly controller = new AbortController();
  readonly lock: ProjectLock;
  readonly shutdown: ShutdownCoordinator;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly launcher: ProcessLauncher;
  private readonly healthGate: HealthGate;
  private _dependencies: DependencySupervisor | null = null;
  private _app: AppSupervisor | null = null;

  constructor(private readonly deps: RunSessionDeps) {
    this.config = deps.config;
    this.logger = deps.logger.child({ session: this.id.slice(0, 8), mode: deps.mode });
    this.launcher = deps.launcher ?? new NodeProcessLauncher();
    this.healthGate = new HealthGate({ logger: this.logger, probe: deps.probe });
    this.shutdown = new ShutdownCoordinator(this.logger);
    this.lock = new ProjectLock({
      lockPath: join(deps.config.stateDir, LOCK_FILE),
      logger: this.logger,
      isAlive: deps.isProcessAlive,
    });
  }

  get mode(): SessionMode {
    return this.deps.mode;
  }

  get hotReload(): boolean {
    return this.deps.hotReload;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get dependencies(): DependencySupervisor | null {
    return this._dependencies;
  }

  get app(): AppSupervisor | null {
    return this._app;
  }

  /** Takes the project lock; rejects with SessionLockedError if another session holds it. */
  async open(): Promise<void> {
    await this.lock.acquire();
    this.shutdown.register("session lock", () => this.lock.release());
    this.logger.debug({ projectPath: this.config.projectPath }, "Session opened");
  }

  async startDependencies(signal: AbortSignal = this.signal): Promise<DependencySupervisor> {
    const dependencies = new DependencySupervisor({
      config: this.config,
      logger: this.logger,
      launcher: this.launcher,
      healthGate: this.healthGate,
      sidecarReset: this.deps.sidecarReset,
    });
    this._dependencies = dependencies;
    this.shutdown.register("workflow-engine", () => dependencies.stopMember("workflow-engine"));
    this.shutdown.register("sidecar", () => dependencies.stopMember("sidecar"));

    await dependencies.bringUp(signal);
    return dependencies;
  }

  /** Runs the app in the foreground until it exits or the session is cancelled. */
  async runApp(): Promise<ChildExit> {
    return this.createApp().run(this.deps.hotReload, this.signal);
  }

  async bringUp(signal: AbortSignal): Promise<void> {
    await this.startDependencies(signal);

    const app = this.createApp();
    app.start();
    const result = await app.awaitHealthy(signal);
    if (result.success) {
      return;
    }

    if (!app.process.isAlive) {
      const exit = await app.process.waitForExit();
      throw new AppCrashError(exit.code, exit.signal, app.process.tail());
    }
    throw new HealthTimeoutError("app", result, app.process.tail());
  }

  appExited(): Promise<ChildExit> {
    const app = this._app;
    if (!app) {
      return new Promise<ChildExit>(() => undefined);
    }
    return app.process.waitForExit();
  }

  appTail(): string[] {
    return this._app?.process.tail() ?? [];
  }

  /** Stops the app and both dependencies now, ahead of the final shutdown. */
  async tearDown(): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      ["app", () => this._app?.stop() ?? Promise.resolve()],
      ["sidecar", () => this._dependencies?.stopMember("sidecar") ?? Promise.resolve()],
      ["workflow-engine", () => this._dependencies?.stopMember("workflow-engine") ?? Promise.resolve()],
    ];

    for (const [name, stop] of steps) {
      try {
        await stop();
      } catch (err) {
        const failure = new ShutdownError(name, err);
        this.logger.warn({ step: name, error: failure.message }, "Teardown step failed");
      }
    }
  }

  /** Idempotent; resolves once every registered step has run. */
  close(): Promise<readonly ShutdownError[]> {
    return this.shutdown.shutdown();
  }

  private createApp(): AppSupervisor {
    if (this._app) {
      return this._app;
    }
    const app = new AppSupervisor({
      config: this.config,
      logger: this.logger,
      launcher: this.launcher,
      healthGate: this.healthGate,
      watch: this.deps.watch,
      echo: this.deps.echo,
    });
    this._app = app;
    this.shutdown.register("app", () => app.stop());
    return app;
  }
}
