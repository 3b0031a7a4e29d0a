import { join } from "node:path";
import { throwIfCancelled } from "../cancellation.js";
import type { OrchestratorConfig } from "../config.js";
import { AppCrashError, errorMessage } from "../errors.js";
import type { HealthGate } from "../health/health-gate.js";
import type { HealthCheckResult } from "../health/types.js";
import type { Logger } from "../logger.js";
import { terminalEcho } from "../process/output-buffer.js";
import { SupervisedProcess } from "../process/supervised-process.js";
import type { ChildExit, OutputEcho, ProcessLauncher } from "../process/types.js";
import { Debouncer } from "./debouncer.js";
import { watchSources, type WatchSources } from "./source-watcher.js";

export interface AppSupervisorDeps {
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly launcher: ProcessLauncher;
  readonly healthGate: HealthGate;
  readonly watch?: WatchSources;
  readonly echo?: OutputEcho;
}

/**
 * Runs the application in the foreground. With hot reload on, source changes
 * are debounced into restart cycles that run one at a time, so there is never
 * more than one application instance.
 */
export class AppSupervisor {
  readonly process: SupervisedProcess;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly healthGate: HealthGate;
  private readonly watch: WatchSources;
  private restarts = 0;

  constructor(deps: AppSupervisorDeps) {
    const { config } = deps;
    this.config = config;
    this.logger = deps.logger.child({ component: "app" });
    this.healthGate = deps.healthGate;
    this.watch = deps.watch ?? watchSources;
    this.process = new SupervisedProcess({
      spec: {
        name: "app",
        command: config.app.launch.command,
        args: config.app.launch.args,
        cwd: config.projectPath,
        env: config.app.env,
      },
      launcher: deps.launcher,
      logger: this.logger,
      gracePeriodMs: config.shutdown.gracePeriodMs,
      killTimeoutMs: config.shutdown.killTimeoutMs,
      logFile: join(config.stateDir, "logs", "app.log"),
      echo: deps.echo ?? terminalEcho,
      tailLines: config.outputTailLines,
    });
  }

  get restartCount(): number {
    return this.restarts;
  }

  start(): void {
    this.process.start();
  }

  stop(): Promise<void> {
    return this.process.stop();
  }

  /** Polls the app's readiness endpoint; gives up early if the app exits. */
  async awaitHealthy(signal?: AbortSignal): Promise<HealthCheckResult> {
    const { healthUrl, readiness } = this.config.app;
    const result = await this.healthGate.waitUntilHealthy({
      url: healthUrl,
      intervalMs: readiness.intervalMs,
      timeoutMs: readiness.timeoutMs,
      signal,
      label: "app",
      abortWhen: () => (this.process.isAlive ? undefined : `app exited with code ${this.process.exitCode ?? "unknown"}`),
    });
    if (result.success) {
      this.process.markHealthy();
    }
    return result;
  }

  /**
   * Starts the app and waits for it to end. Resolves with a clean exit or one
   * caused by stop(); rejects with AppCrashError on any other exit and with
   * CancelledError when the signal fires. The process is left for shutdown to
   * stop.
   */
  async run(hotReload: boolean, signal: AbortSignal): Promise<ChildExit> {
    let failRun: (error: unknown) => void = () => undefined;
    const restartFailed = new Promise<never>((_, reject) => {
      failRun = reject;
    });
    let cycle: Promise<void> | null = null;
    let pending = false;
    let lastChange = "";

    const restart = async (): Promise<void> => {
      do {
        pending = false;
        await this.process.stop();
        if (signal.aborted) {
          return;
        }
        this.process.start();
        this.restarts += 1;
      } while (pending);
    };

    const requestRestart = (): void => {
      if (cycle) {
        pending = true;
        this.logger.debug({ path: lastChange }, "Restart already in progress, queued another");
        return;
      }
      this.logger.info({ path: lastChange }, "Change detected, restarting app");
      cycle = restart()
        .catch((err: unknown) => {
          this.logger.error({ error: errorMessage(err) }, "Restart failed");
          failRun(err);
        })
        .finally(() => {
          cycle = null;
        });
    };

    const debouncer = new Debouncer(this.config.app.debounceMs, requestRestart);
    this.process.start();

    const watcher = hotReload
      ? this.watch(this.config.projectPath, {
          ignore: this.config.app.watchIgnore,
          onChange: (path) => {
            lastChange = path;
            debouncer.trigger();
          },
          onError: (error) => this.logger.warn({ error: error.message }, "File watcher error"),
        })
      : null;
    if (watcher) {
      this.logger.info({ path: this.config.projectPath }, "Watching for changes");
    }

    try {
      for (;;) {
        const launched = this.process.launchCount;
        const exit = await Promise.race([this.process.waitForExit(signal), restartFailed]);

        if (cycle || this.process.launchCount !== launched) {
          await Promise.race([cycle, restartFailed]);
          continue;
        }
        throwIfCancelled(signal);

        if (this.process.stopRequested || (exit.code === 0 && !exit.error)) {
          this.logger.info({ exitCode: exit.code }, "App exited");
          return exit;
        }
        throw new AppCrashError(exit.code, exit.signal, this.process.tail());
      }
    } finally {
      debouncer.cancel();
      await watcher?.close();
      await cycle;
    }
  }
}
