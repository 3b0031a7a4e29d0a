import type { EnvironmentBlocker } from "./preflight/types.js";
import type { HealthCheckResult } from "./health/types.js";

export const EXIT_CODES = {
  success: 0,
  testFailure: 1,
  usage: 2,
  environmentBlocker: 10,
  dependencyStartupFailure: 11,
  healthTimeout: 12,
  appCrash: 13,
  sessionLocked: 14,
  internal: 70,
  cancelled: 130,
} as const;

export type ErrorKind =
  | "environment-blocker"
  | "dependency-startup-failure"
  | "health-timeout"
  | "app-crash"
  | "session-locked"
  | "configuration"
  | "usage"
  | "cancelled"
  | "shutdown";

export abstract class OrchestratorError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;
}

export class EnvironmentBlockerError extends OrchestratorError {
  readonly kind = "environment-blocker";
  readonly exitCode = EXIT_CODES.environmentBlocker;

  constructor(readonly blockers: readonly EnvironmentBlocker[]) {
    super(
      blockers.length === 1
        ? `Environment is not ready: ${blockers[0]?.detail}`
        : `Environment is not ready: ${blockers.length} problems found`
    );
    this.name = "EnvironmentBlockerError";
  }
}

export class DependencyStartupError extends OrchestratorError {
  readonly kind = "dependency-startup-failure";
  readonly exitCode = EXIT_CODES.dependencyStartupFailure;

  constructor(
    readonly dependency: string,
    readonly reason: string,
    readonly outputTail: readonly string[]
  ) {
    super(`${dependency} failed to start: ${reason}`);
    this.name = "DependencyStartupError";
  }
}

/** The app missed its readiness deadline. Dependencies that do so fail as DependencyStartupError. */
export class HealthTimeoutError extends OrchestratorError {
  readonly kind = "health-timeout";
  readonly exitCode = EXIT_CODES.healthTimeout;

  constructor(
    readonly target: string,
    readonly result: HealthCheckResult,
    readonly logTail: readonly string[]
  ) {
    super(`${target} did not become healthy: ${result.error ?? "no successful response"}`);
    this.name = "HealthTimeoutError";
  }
}

export class AppCrashError extends OrchestratorError {
  readonly kind = "app-crash";
  readonly exitCode = EXIT_CODES.appCrash;

  constructor(
    readonly appExitCode: number | null,
    readonly signal: string | null,
    readonly logTail: readonly string[]
  ) {
    super(
      signal
        ? `Application was terminated by ${signal}`
        : `Application exited unexpectedly with code ${appExitCode ?? "unknown"}`
    );
    this.name = "AppCrashError";
  }
}

export class SessionLockedError extends OrchestratorError {
  readonly kind = "session-locked";
  readonly exitCode = EXIT_CODES.sessionLocked;

  constructor(
    readonly lockPath: string,
    readonly ownerPid: number | null
  ) {
    super(
      ownerPid === null
        ? `Another session holds ${lockPath}`
        : `Another session (pid ${ownerPid}) is already running for this project`
    );
    this.name = "SessionLockedError";
  }
}

export class ConfigurationError extends OrchestratorError {
  readonly kind = "configuration";
  readonly exitCode = EXIT_CODES.usage;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UsageError extends OrchestratorError {
  readonly kind = "usage";
  readonly exitCode = EXIT_CODES.usage;

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class CancelledError extends OrchestratorError {
  readonly kind = "cancelled";
  readonly exitCode = EXIT_CODES.cancelled;

  constructor(readonly reason = "interrupted") {
    super(`Cancelled: ${reason}`);
    this.name = "CancelledError";
  }
}

export class ShutdownError extends OrchestratorError {
  readonly kind = "shutdown";
  readonly exitCode = EXIT_CODES.internal;

  constructor(
    readonly step: string,
    cause: unknown
  ) {
    super(`Failed to stop ${step}: ${errorMessage(cause)}`, { cause });
    this.name = "ShutdownError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof OrchestratorError ? error.exitCode : EXIT_CODES.internal;
}

export function isInfrastructureExitCode(code: number): boolean {
  return code >= EXIT_CODES.environmentBlocker && code <= EXIT_CODES.sessionLocked;
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
