import {
  AppCrashError,
  DependencyStartupError,
  EnvironmentBlockerError,
  errorMessage,
  HealthTimeoutError,
} from "../errors.js";
import type { EnvironmentBlocker } from "../preflight/types.js";

const TAIL_LINES = 20;

export function formatBlockers(blockers: readonly EnvironmentBlocker[]): string {
  const lines = [`Cannot start: ${blockers.length} environment problem${blockers.length === 1 ? "" : "s"}`];
  for (const blocker of blockers) {
    lines.push(`  [${blocker.kind}] ${blocker.detail}`);
    lines.push(`    hint: ${blocker.hint}`);
  }
  return lines.join("\n");
}

/** Human-readable account of why a session ended, with the captured output that explains it. */
export function formatFailure(error: unknown): string {
  if (error instanceof EnvironmentBlockerError) {
    return formatBlockers(error.blockers);
  }

  const lines = [`Error: ${errorMessage(error)}`];
  const tail =
    error instanceof DependencyStartupError
      ? error.outputTail
      : error instanceof HealthTimeoutError || error instanceof AppCrashError
        ? error.logTail
        : [];

  if (tail.length > 0) {
    lines.push(`Last ${Math.min(tail.length, TAIL_LINES)} lines of output:`);
    for (const line of tail.slice(-TAIL_LINES)) {
      lines.push(`  | ${line}`);
    }
  }
  return lines.join("\n");
}
