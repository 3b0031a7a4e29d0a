export { loadConfig, formatCommand, CONFIG_FILE_NAME, STATE_DIR_NAME } from "./config.js";
export type {
  AppConfig,
  CommandSpec,
  DependencyConfig,
  LogLevel,
  OrchestratorConfig,
  PortMap,
  ReadinessPolicy,
  ShutdownConfig,
  SidecarConfig,
  TestsConfig,
} from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export * from "./errors.js";

export { PreflightChecker } from "./preflight/preflight-checker.js";
export { PathBinaryLocator } from "./preflight/binary-locator.js";
export type { BinaryLocator, BlockerKind, EnvironmentBlocker, PreflightResult } from "./preflight/types.js";

export { HealthGate } from "./health/health-gate.js";
export { FetchHealthProbe } from "./health/fetch-probe.js";
export type { HealthCheckResult, HealthProbe, HealthWaitRequest, ProbeOutcome } from "./health/types.js";

export { SupervisedProcess } from "./process/supervised-process.js";
export { NodeProcessLauncher } from "./process/node-launcher.js";
export type { ChildExit, LaunchSpec, LaunchedChild, OutputEcho, ProcessLauncher } from "./process/types.js";

export { DependencySupervisor } from "./dependencies/dependency-supervisor.js";
export { RuntimeStateStore, type RuntimeState } from "./dependencies/runtime-state.js";
export { CommandSidecarReset } from "./dependencies/sidecar-reset.js";
export type { DependencyName, DependencySetState, SidecarReset } from "./dependencies/types.js";

export { AppSupervisor } from "./app/app-supervisor.js";
export { watchSources, type SourceWatcher, type WatchSources } from "./app/source-watcher.js";

export { TestLoopController, buildPhaseCommand, phasesFor } from "./testing/test-loop.js";
export { ProcessCommandRunner } from "./testing/command-runner.js";
export { formatTestReport, writeTestReport, aggregateExitCode } from "./testing/report.js";
export type { TestMode, TestPhaseResult, TestReport, TestRunOptions } from "./testing/types.js";

export { RunSession } from "./session/run-session.js";
export { ProjectLock } from "./session/project-lock.js";
export type { SessionMode } from "./session/types.js";
export { ShutdownCoordinator } from "./shutdown/shutdown-coordinator.js";
export { SignalTrap } from "./shutdown/signal-trap.js";

export { runCommand, type RunCommandOptions } from "./commands/run.js";
export { testCommand } from "./commands/test.js";
export type { CommandContext } from "./commands/types.js";
