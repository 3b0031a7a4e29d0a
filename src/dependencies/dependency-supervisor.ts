import { join } from "node:path";
import { cancelledFrom, linkedController, throwIfCancelled } from "../cancellation.js";
import type { DependencyConfig, OrchestratorConfig } from "../config.js";
import { CancelledError, DependencyStartupError, errorMessage } from "../errors.js";
import type { HealthGate } from "../health/health-gate.js";
import type { Logger } from "../logger.js";
import { SupervisedProcess } from "../process/supervised-process.js";
import type { ProcessLauncher } from "../process/types.js";
import { RUNTIME_STATE_FILE, RuntimeStateStore } from "./runtime-state.js";
import { CommandSidecarReset } from "./sidecar-reset.js";
import type { DependencyName, DependencySetState, SidecarReset } from "./types.js";

export interface DependencySupervisorDeps {
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly launcher: ProcessLauncher;
  readonly healthGate: HealthGate;
  readonly runtimeState?: RuntimeStateStore;
  readonly sidecarReset?: SidecarReset;
}

const MAX_RECOVERIES = 1;

/**
 * Owns the workflow engine and the sidecar runtime. Both are launched
 * together and the set is ready only when both answer their health checks.
 * A sidecar that fails readiness gets one reset-and-restart per session; the
 * workflow engine gets none.
 */
export class DependencySupervisor {
  readonly workflowEngine: SupervisedProcess;
  readonly sidecar: SupervisedProcess;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly healthGate: HealthGate;
  private readonly runtimeState: RuntimeStateStore;
  private readonly sidecarReset: SidecarReset;
  private _state: DependencySetState = "not-started";
  private recoveries = 0;

  constructor(deps: DependencySupervisorDeps) {
    const { config, launcher } = deps;
    this.config = config;
    this.logger = deps.logger.child({ component: "dependencies" });
    this.healthGate = deps.healthGate;
    this.runtimeState =
      deps.runtimeState ?? new RuntimeStateStore(join(config.stateDir, RUNTIME_STATE_FILE), this.logger);
    this.sidecarReset =
      deps.sidecarReset ??
      new CommandSidecarReset({
        commands: config.sidecar.resetCommands,
        cwd: config.projectPath,
        launcher,
        logger: this.logger,
        ...config.shutdown,
      });

    this.workflowEngine = this.createProcess("workflow-engine", config.workflowEngine, launcher);
    this.sidecar = this.createProcess("sidecar", config.sidecar, launcher);
  }

  get state(): DependencySetState {
    return this._state;
  }

  get recoveryAttempts(): number {
    return this.recoveries;
  }

  member(name: DependencyName): SupervisedProcess {
    return name === "workflow-engine" ? this.workflowEngine : this.sidecar;
  }

  /**
   * Resolves once both members are healthy. Rejects with DependencyStartupError
   * on a terminal failure, or CancelledError when the signal fires. Members
   * that were started are left for the caller's shutdown to stop.
   */
  async bringUp(signal?: AbortSignal): Promise<void> {
    if (this._state !== "not-started") {
      throw new Error(`Dependencies were already started (state: ${this._state})`);
    }

    throwIfCancelled(signal);
    this.transition("starting");
    this.startMember(this.workflowEngine);
    this.startMember(this.sidecar);
    this.transition("awaiting-ready");

    const { controller, dispose } = linkedController(signal);
    const shortCircuit = (error: unknown): never => {
      if (error instanceof DependencyStartupError && !controller.signal.aborted) {
        controller.abort(new CancelledError(`${error.dependency} failed`));
      }
      throw error;
    };

    try {
      const results = await Promise.allSettled([
        this.awaitReady(this.workflowEngine, this.config.workflowEngine, controller.signal).catch(shortCircuit),
        this.awaitSidecar(controller.signal).catch(shortCircuit),
      ]);

      if (signal?.aborted) {
        throw cancelledFrom(signal);
      }

      const failures: unknown[] = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
      if (failures.length > 0) {
        this.transition("failed");
        throw failures.find((failure) => failure instanceof DependencyStartupError) ?? failures[0];
      }

      this.transition("ready");
    } finally {
      dispose();
    }
  }

  /** Graceful then forced stop of one member; a member that is not running is left alone. */
  async stopMember(name: DependencyName): Promise<void> {
    await this.member(name).stop();
  }

  private createProcess(name: DependencyName, dependency: DependencyConfig, launcher: ProcessLauncher): SupervisedProcess {
    const { config } = this;
    return new SupervisedProcess({
      spec: {
        name,
        command: dependency.launch.command,
        args: dependency.launch.args,
        cwd: config.projectPath,
        env: dependency.env,
      },
      launcher,
      logger: this.logger,
      gracePeriodMs: config.shutdown.gracePeriodMs,
      killTimeoutMs: config.shutdown.killTimeoutMs,
      logFile: join(config.stateDir, "logs", `${name}.log`),
      tailLines: config.outputTailLines,
    });
  }

  private startMember(member: SupervisedProcess): void {
    try {
      member.start();
    } catch (err) {
      this.transition("failed");
      throw new DependencyStartupError(member.name, errorMessage(err), member.tail());
    }
  }

  private async awaitSidecar(signal: AbortSignal): Promise<void> {
    try {
      await this.awaitReady(this.sidecar, this.config.sidecar, signal);
      return;
    } catch (err) {
      if (!(err instanceof DependencyStartupError) || this.recoveries >= MAX_RECOVERIES) {
        throw err;
      }
      this.transition("degraded");
      this.logger.warn({ reason: err.reason }, "Sidecar is degraded, attempting one recovery");
    }

    this.recoveries += 1;
    this.transition("recovering");
    await this.sidecar.stop();

    try {
      await this.sidecarReset.reset(signal);
    } catch (err) {
      if (err instanceof CancelledError) {
        throw err;
      }
      throw new DependencyStartupError("sidecar", `recovery failed: ${errorMessage(err)}`, this.sidecar.tail());
    }
    await this.runtimeState.recordRecovery();
    throwIfCancelled(signal);

    this.logger.info("Restarting sidecar after reset");
    this.startMember(this.sidecar);

    try {
      await this.awaitReady(this.sidecar, this.config.sidecar, signal);
    } catch (err) {
      if (err instanceof DependencyStartupError) {
        throw new DependencyStartupError("sidecar", `still unhealthy after recovery: ${err.reason}`, err.outputTail);
      }
      throw err;
    }
  }

  private async awaitReady(member: SupervisedProcess, dependency: DependencyConfig, signal: AbortSignal): Promise<void> {
    const result = await this.healthGate.waitUntilHealthy({
      url: dependency.healthUrl,
      intervalMs: dependency.readiness.intervalMs,
      timeoutMs: dependency.readiness.timeoutMs,
      signal,
      label: member.name,
      abortWhen: () => (member.isAlive ? undefined : `${member.name} exited with code ${member.exitCode ?? "unknown"}`),
    });

    if (!result.success) {
      throw new DependencyStartupError(member.name, result.error ?? "not healthy", member.tail());
    }
    member.markHealthy();
  }

  private transition(next: DependencySetState): void {
    if (this._state === next) {
      return;
    }
    this.logger.debug({ from: this._state, to: next }, "Dependency set state changed");
    this._state = next;
  }
}
